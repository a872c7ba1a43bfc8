#!/usr/bin/env node
import { Command } from 'commander'
import { loadConfig } from '../config/index.js'
import { isOwedDelivery } from '../core/notifications/dispatcher.js'
import { UrlCipher } from '../core/subscribers/cipher.js'
import { buildTriggerBody } from '../core/trigger/queue.js'
import { createConnectedRedisClient } from '../integrations/redis/client.js'
import { RedisTriggerQueue } from '../integrations/redis/trigger-queue.js'
import { logger } from '../utils/logger.js'
import { App } from './App.js'
import { createAlertContext } from './context.js'
import { withAppLogging } from './logging.js'

const program = new Command()

program
  .name('french-toast')
  .description('French Toast alert level watcher and Slack fanout')
  .version('0.1.0')

program
  .command('start')
  .description('Start the scheduler and, when REDIS_URL is set, the queue worker')
  .action(async () => {
    await new App().start()
  })

program
  .command('check')
  .description('Request a status check by publishing a message to the trigger queue')
  .option('--local', 'Run one check cycle in this process instead of publishing')
  .action(async (opts: { local?: boolean }) => {
    const config = loadConfig()
    await withAppLogging(config, async () => {
      if (opts.local) {
        const context = createAlertContext(config)
        await context.statusStore.initialize()
        const result = await context.listener.onTrigger('manual')
        console.log(JSON.stringify(result, null, 2))
        return
      }

      if (!config.REDIS_URL) {
        throw new Error('REDIS_URL is required to publish a status check; use --local to run one in-process')
      }
      const client = await createConnectedRedisClient({ url: config.REDIS_URL, clientName: 'french-toast-check' })
      const queue = new RedisTriggerQueue({ client, queueName: config.TRIGGER_QUEUE_NAME })
      try {
        await queue.publish(buildTriggerBody('cli'))
        console.log(`Status check requested on ${config.TRIGGER_QUEUE_NAME}`)
      }
      finally {
        await queue.close()
      }
    })
  })

program
  .command('register')
  .description('Register or reactivate a subscriber webhook and send it the current status')
  .requiredOption('--team <id>', 'Team id')
  .requiredOption('--channel <id>', 'Channel id')
  .requiredOption('--url <url>', 'Incoming webhook URL')
  .action(async (opts: { team: string; channel: string; url: string }) => {
    const config = loadConfig()
    await withAppLogging(config, async () => {
      const context = createAlertContext(config)
      const result = await context.registration.register({
        teamId: opts.team,
        channelId: opts.channel,
        url: opts.url,
      })
      console.log(JSON.stringify({
        id: result.subscriber.id,
        teamId: result.subscriber.teamId,
        channelId: result.subscriber.channelId,
        created: result.created,
        initialDelivery: result.initialDelivery,
      }, null, 2))
    })
  })

program
  .command('status')
  .description('Print the stored status and subscriber counts')
  .action(async () => {
    const config = loadConfig()
    await withAppLogging(config, async () => {
      const context = createAlertContext(config)
      const status = await context.statusStore.load()
      const subscribers = await context.subscriberStore.list()
      const inactive = subscribers.filter(subscriber => subscriber.inactive).length
      const updated = status.updated
      console.log(JSON.stringify({
        status: status.status || null,
        updated: status.updated,
        subscribers: subscribers.length,
        active: subscribers.length - inactive,
        inactive,
        owed: updated === null
          ? 0
          : subscribers.filter(subscriber => isOwedDelivery(subscriber, updated)).length,
      }, null, 2))
    })
  })

program
  .command('keygen')
  .description('Print a new random TOKEN_KEY')
  .action(() => {
    console.log(UrlCipher.generateKey())
  })

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('Command failed', { error })
  process.exitCode = 1
})
