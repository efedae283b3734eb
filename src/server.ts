import { buildApp } from './app'
import { config } from './config/env'
import os from 'os'

function getNetworkAddresses(): string[] {
  return Object.values(os.networkInterfaces())
    .flatMap(addrs => addrs ?? [])
    .filter(addr => addr.family === 'IPv4' && !addr.internal)
    .map(addr => addr.address)
}

async function start() {
  const app = await buildApp()

  try {
    await app.listen({ port: config.api.port, host: '0.0.0.0' })

    app.log.info({
      msg: `✓ [API] Server listening on localhost:${config.api.port}`,
      url: `http://localhost:${config.api.port}`,
    })
    for (const ip of getNetworkAddresses()) {
      app.log.info({ msg: `✓ [API] Server listening on ${ip}:${config.api.port}`, url: `http://${ip}:${config.api.port}` })
    }
  } catch (err) {
    app.log.error(err)
    process.exit(1)
  }

  const shutdown = (signal: string) => {
    app.log.info({ msg: `[API] ${signal} received, shutting down` })
    app.close().then(
      () => process.exit(0),
      err => {
        app.log.error(err)
        process.exit(1)
      }
    )
  }
  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))
}

void start()
