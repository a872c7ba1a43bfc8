import assert from 'node:assert/strict'
import test from 'node:test'
import { ZodError } from 'zod'

import { UrlCipher } from '../../src/core/subscribers/cipher.js'
import { SubscriberRegistration } from '../../src/core/subscribers/registration.js'
import { SubscriberStore } from '../../src/core/subscribers/store.js'
import type { DeliveryOutcome, Subscriber } from '../../src/types/index.js'
import { RecordingReporter, TEST_KEY, createTempDataPath, removeTempDataPath } from '../support/fakes.js'

const registeredAt = '2024-01-15T12:00:00.000Z'

interface RegistrationFixture {
  store: SubscriberStore
  cipher: UrlCipher
  reporter: RecordingReporter
  delivered: Subscriber[]
  registration: SubscriberRegistration
}

async function withRegistration(
  run: (fixture: RegistrationFixture) => Promise<void>,
  outcome: DeliveryOutcome = 'delivered',
): Promise<void> {
  const dataPath = await createTempDataPath()
  const store = new SubscriberStore({ dataPath, lockTimeoutMs: 1_000 })
  const cipher = new UrlCipher(TEST_KEY)
  const reporter = new RecordingReporter()
  const delivered: Subscriber[] = []
  const registration = new SubscriberRegistration({
    store,
    cipher,
    reporter,
    clock: () => registeredAt,
    onRegistered: async (subscriber) => {
      delivered.push(subscriber)
      return outcome
    },
  })
  try {
    await run({ store, cipher, reporter, delivered, registration })
  }
  finally {
    await removeTempDataPath(dataPath)
  }
}

test('stores a new subscriber with an encrypted URL', async () => {
  await withRegistration(async ({ store, cipher, reporter, delivered, registration }) => {
    const result = await registration.register({
      teamId: ' T1 ',
      channelId: 'C1',
      url: ' https://hooks.slack.test/services/T1/C1/test-token ',
    })

    assert.equal(result.created, true)
    assert.equal(result.initialDelivery, 'delivered')
    assert.equal(result.subscriber.teamId, 'T1')
    assert.equal(result.subscriber.added, registeredAt)
    assert.equal(cipher.decrypt(result.subscriber.encryptedUrl), 'https://hooks.slack.test/services/T1/C1/test-token')
    assert.deepEqual(reporter.events, [
      { name: 'subscriber_added', payload: { subscriberId: 1, teamId: 'T1', channelId: 'C1' } },
    ])
    assert.deepEqual(delivered.map(subscriber => subscriber.id), [1])
    assert.equal((await store.list()).length, 1)
  })
})

test('re-registering updates the URL and reactivates the subscriber', async () => {
  await withRegistration(async ({ store, cipher, reporter, registration }) => {
    const first = await registration.register({
      teamId: 'T1',
      channelId: 'C1',
      url: 'https://hooks.slack.test/services/T1/C1/old-token',
    })
    await store.markInactive(first.subscriber.id)

    const second = await registration.register({
      teamId: 'T1',
      channelId: 'C1',
      url: 'https://hooks.slack.test/services/T1/C1/new-token',
    })

    assert.equal(second.created, false)
    assert.equal(second.subscriber.id, first.subscriber.id)
    assert.equal(second.subscriber.inactive, false)
    assert.equal(cipher.decrypt(second.subscriber.encryptedUrl), 'https://hooks.slack.test/services/T1/C1/new-token')
    assert.deepEqual(reporter.names(), ['subscriber_added', 'subscriber_updated'])
    assert.equal((await store.listActive()).length, 1)
  })
})

test('passes through the initial delivery outcome', async () => {
  await withRegistration(async ({ registration }) => {
    const result = await registration.register({
      teamId: 'T1',
      channelId: 'C1',
      url: 'https://hooks.slack.test/services/T1/C1/test-token',
    })
    assert.equal(result.initialDelivery, 'skipped')
  }, 'skipped')
})

test('rejects invalid input without storing anything', async () => {
  await withRegistration(async ({ store, reporter, delivered, registration }) => {
    await assert.rejects(
      registration.register({ teamId: 'T1', channelId: 'C1', url: 'not a url' }),
      ZodError,
    )
    await assert.rejects(
      registration.register({ teamId: '  ', channelId: 'C1', url: 'https://hooks.slack.test/x' }),
      ZodError,
    )

    assert.deepEqual(await store.list(), [])
    assert.deepEqual(reporter.events, [])
    assert.deepEqual(delivered, [])
  })
})
