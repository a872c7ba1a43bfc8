import assert from 'node:assert/strict'
import test from 'node:test'

import { QueueWorker } from '../../src/core/trigger/worker.js'
import { InMemoryTriggerQueue, waitFor } from '../support/fakes.js'

test('handles published messages in order until stopped', async () => {
  const queue = new InMemoryTriggerQueue()
  const handled: string[] = []
  const worker = new QueueWorker({
    queue,
    blockSeconds: 1,
    handler: async (message) => {
      handled.push(message.body)
    },
  })

  await queue.publish('one')
  await queue.publish('two')
  const loop = worker.start()
  assert.equal(worker.isRunning(), true)

  await waitFor(() => handled.length === 2)
  await worker.stop()
  await loop

  assert.deepEqual(handled, ['one', 'two'])
  assert.equal(worker.isRunning(), false)
})

test('keeps consuming after receive failures', async () => {
  const queue = new InMemoryTriggerQueue()
  queue.failReceives = 2
  const handled: string[] = []
  const worker = new QueueWorker({
    queue,
    blockSeconds: 1,
    retryBackoffMs: 5,
    handler: async (message) => {
      handled.push(message.body)
    },
  })

  await queue.publish('after-outage')
  const loop = worker.start()
  await waitFor(() => handled.length === 1)
  await worker.stop()
  await loop

  assert.equal(queue.failReceives, 0)
  assert.deepEqual(handled, ['after-outage'])
})

test('a failing handler does not stop the loop', async () => {
  const queue = new InMemoryTriggerQueue()
  const handled: string[] = []
  const worker = new QueueWorker({
    queue,
    blockSeconds: 1,
    retryBackoffMs: 5,
    handler: async (message) => {
      handled.push(message.body)
      if (message.body === 'bad') throw new Error('handler exploded')
    },
  })

  await queue.publish('bad')
  await queue.publish('good')
  worker.start().catch((error: unknown) => {
    assert.fail(`worker loop rejected: ${String(error)}`)
  })
  await waitFor(() => handled.length === 2)
  await worker.stop()

  assert.deepEqual(handled, ['bad', 'good'])
})

test('runOnce reports whether a message was handled', async () => {
  const queue = new InMemoryTriggerQueue()
  const worker = new QueueWorker({ queue, blockSeconds: 1, handler: async () => {} })

  assert.equal(await worker.runOnce(), false)
  await queue.publish('ping')
  assert.equal(await worker.runOnce(), true)
  assert.deepEqual(queue.messages, [])
})
