import 'dotenv/config'
import { z } from 'zod'

const positiveInt = (fallback: string) => z.string().default(fallback).pipe(z.coerce.number().int().positive())

const envSchema = z.object({
  // Non-sensitive - defaults OK
  MQTT_BROKER: z.string().default('mqtt://localhost'),
  MQTT_TOPIC_PREFIX: z.string().default('devices'),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: positiveInt('5432'),
  API_PORT: positiveInt('3001'),
  DOOR_PROCESSING_DELAY_MS: positiveInt('1050'),
  DOOR_STATUS_TIMEOUT_MS: positiveInt('60000'),
  DOOR_REQUEST_TTL_MS: positiveInt('1200000'),
  // Sensitive - no defaults, requires .env file
  DB_USER: z.string(),
  DB_PASSWORD: z.string(),
  DB_NAME: z.string(),
})

export function loadConfig(source: NodeJS.ProcessEnv) {
  const env = envSchema.parse(source)

  return {
    mqtt: {
      broker: env.MQTT_BROKER,
      topicPrefix: env.MQTT_TOPIC_PREFIX,
    },
    db: {
      user: env.DB_USER,
      host: env.DB_HOST,
      password: env.DB_PASSWORD,
      port: env.DB_PORT,
      database: env.DB_NAME,
      ssl: false,
      connectionTimeoutMillis: 10000,
      idleTimeoutMillis: 30000,
      allowExitOnIdle: false,
    },
    api: {
      port: env.API_PORT,
    },
    doors: {
      processingDelayMs: env.DOOR_PROCESSING_DELAY_MS,
      statusTimeoutMs: env.DOOR_STATUS_TIMEOUT_MS,
      requestTtlMs: env.DOOR_REQUEST_TTL_MS,
    },
  }
}

export const config = loadConfig(process.env)
