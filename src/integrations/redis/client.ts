import { createClient } from 'redis'
import { asErrorMessage, logger as rootLogger } from '../../utils/logger.js'

const logger = rootLogger.child('redis')

export type AppRedisClient = ReturnType<typeof createClient>

export interface RedisClientOptions {
  url: string
  clientName?: string
}

export async function createConnectedRedisClient(options: RedisClientOptions): Promise<AppRedisClient> {
  const client = createClient({
    url: options.url,
    name: options.clientName,
    socket: {
      reconnectStrategy(retries: number) {
        return Math.min(retries * 100, 2_000)
      },
    },
  })
  client.on('error', (error: unknown) => {
    logger.warn('Redis client error', { clientName: options.clientName, error: asErrorMessage(error) })
  })

  await client.connect()
  const pong = await client.ping()
  if (pong !== 'PONG') {
    await client.quit()
    throw new Error('Redis ping failed during startup')
  }

  logger.debug('Redis client connected', { clientName: options.clientName })
  return client
}

export async function closeRedisClient(client: AppRedisClient): Promise<void> {
  try {
    await client.quit()
  }
  catch (error) {
    logger.warn('Redis quit failed, forcing disconnect', { error: asErrorMessage(error) })
    await client.disconnect()
  }
}
