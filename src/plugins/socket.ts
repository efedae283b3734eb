import fp from 'fastify-plugin'
import { Server, Socket } from 'socket.io'

declare module 'fastify' {
  interface FastifyInstance {
    io: Server
  }
}

export default fp(async fastify => {
  const io = new Server(fastify.server, {
    cors: {
      origin: '*',
      methods: ['GET', 'POST'],
    },
    pingTimeout: 60000,
    pingInterval: 25000,
  })

  io.on('connection', (socket: Socket) => {
    const ip = socket.handshake.address

    fastify.log.info({
      msg: `[WEBSOCKET] Client connected (${ip})`,
      source: 'USER',
      socketId: socket.id,
      ip,
      transport: socket.conn.transport.name,
      totalClients: io.engine.clientsCount,
    })

    socket.on('disconnect', (reason: string) => {
      fastify.log.info({
        msg: '[WEBSOCKET] Client disconnected',
        source: 'USER',
        socketId: socket.id,
        reason,
        totalClients: io.engine.clientsCount,
      })
    })

    socket.on('error', (error: Error) => {
      fastify.log.error({
        msg: '[WEBSOCKET] Socket error',
        socketId: socket.id,
        error: error.message,
      })
    })
  })

  io.engine.on('connection_error', (err: Error) => {
    fastify.log.error({
      msg: '[WEBSOCKET] Engine connection error',
      error: err.message,
    })
  })

  fastify.decorate('io', io)

  fastify.addHook('onClose', (instance, done) => {
    instance.log.info({ msg: '[WEBSOCKET] Closing Socket.IO server' })
    instance.io.close()
    done()
  })
})
