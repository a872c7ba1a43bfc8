import assert from 'node:assert/strict'
import test from 'node:test'

import { SourceError } from '../../src/core/errors.js'
import { ChangeDetector } from '../../src/core/status/detector.js'
import { StatusStore } from '../../src/core/status/store.js'
import type { StatusSource } from '../../src/integrations/toast/source.js'
import {
  RecordingReporter,
  ScriptedStatusSource,
  createTempDataPath,
  removeTempDataPath,
} from '../support/fakes.js'

const checkedAt = '2024-01-15T12:00:00.000Z'

interface DetectorFixture {
  dataPath: string
  store: StatusStore
  reporter: RecordingReporter
  detector: (source: StatusSource) => ChangeDetector
}

async function withDetector(run: (fixture: DetectorFixture) => Promise<void>): Promise<void> {
  const dataPath = await createTempDataPath()
  const store = new StatusStore({ dataPath, lockTimeoutMs: 1_000 })
  const reporter = new RecordingReporter()
  try {
    await store.initialize()
    await run({
      dataPath,
      store,
      reporter,
      detector: source => new ChangeDetector({ source, store, reporter, clock: () => checkedAt }),
    })
  }
  finally {
    await removeTempDataPath(dataPath)
  }
}

test('the first recognised status is a change from the sentinel', async () => {
  await withDetector(async ({ store, reporter, detector }) => {
    const result = await detector(new ScriptedStatusSource('low')).checkForChange()

    assert.ok(result.changed)
    assert.equal(result.previous.status, '')
    assert.equal(result.snapshot.status, 'LOW')
    assert.equal(result.snapshot.level.title, '1 Slice / Low')
    assert.equal(result.snapshot.updated, checkedAt)
    assert.deepEqual(await store.load(), { id: 1, status: 'LOW', updated: checkedAt })
    assert.deepEqual(reporter.events, [])
  })
})

test('an equal status is not a change', async () => {
  await withDetector(async ({ store, detector }) => {
    await store.commitChange('HIGH', '2024-01-15T11:00:00.000Z')
    const result = await detector(new ScriptedStatusSource('high')).checkForChange()

    assert.deepEqual(result, {
      changed: false,
      reason: 'unchanged',
      current: { id: 1, status: 'HIGH', updated: '2024-01-15T11:00:00.000Z' },
    })
  })
})

test('network failures are reported once and leave the row untouched', async () => {
  await withDetector(async ({ store, reporter, detector }) => {
    await store.commitChange('LOW', '2024-01-15T11:00:00.000Z')
    const source = new ScriptedStatusSource(new SourceError('network', 'HTTP 503: busy', { httpStatus: 503 }))
    const result = await detector(source).checkForChange()

    assert.ok(!result.changed)
    assert.equal(result.reason, 'fetch-failed')
    assert.deepEqual(reporter.events, [
      { name: 'status_fetch_failed', payload: { kind: 'network', httpStatus: 503, error: 'HTTP 503: busy' } },
    ])
    assert.equal((await store.load()).status, 'LOW')
  })
})

test('malformed feeds are reported as invalid XML', async () => {
  await withDetector(async ({ reporter, detector }) => {
    const source = new ScriptedStatusSource(new SourceError('malformed', 'Status element missing or empty'))
    const result = await detector(source).checkForChange()

    assert.equal(result.changed, false)
    assert.deepEqual(reporter.names(), ['invalid_xml_status'])
  })
})

test('unknown levels are reported and never stored', async () => {
  await withDetector(async ({ store, reporter, detector }) => {
    await store.commitChange('GUARDED', '2024-01-15T11:00:00.000Z')
    const result = await detector(new ScriptedStatusSource('blizzard')).checkForChange()

    assert.ok(!result.changed)
    assert.equal(result.reason, 'unknown-level')
    assert.deepEqual(reporter.events, [
      {
        name: 'unknown_status',
        payload: { status: 'BLIZZARD', current: 'GUARDED', error: 'Unknown alert level: BLIZZARD' },
      },
    ])
    assert.deepEqual(await store.load(), { id: 1, status: 'GUARDED', updated: '2024-01-15T11:00:00.000Z' })
  })
})

test('unexpected source errors propagate', async () => {
  await withDetector(async ({ reporter, detector }) => {
    await assert.rejects(detector(new ScriptedStatusSource(new Error('boom'))).checkForChange(), /boom/)
    assert.deepEqual(reporter.events, [])
  })
})

class GatedSource implements StatusSource {
  private waiting: Array<() => void> = []

  constructor(private readonly status: string, private readonly callers: number) {}

  fetch(): Promise<string> {
    return new Promise((resolve) => {
      this.waiting.push(() => resolve(this.status))
      if (this.waiting.length === this.callers) {
        for (const release of this.waiting.splice(0)) release()
      }
    })
  }
}

test('only one of two concurrent runs reports the change', async () => {
  await withDetector(async ({ dataPath, store, reporter }) => {
    await store.commitChange('LOW', '2024-01-15T11:00:00.000Z')
    const source = new GatedSource('SEVERE', 2)
    const first = new ChangeDetector({ source, store, reporter, clock: () => checkedAt })
    const second = new ChangeDetector({
      source,
      store: new StatusStore({ dataPath, lockTimeoutMs: 1_000 }),
      reporter,
      clock: () => '2024-01-15T12:00:05.000Z',
    })

    const results = await Promise.all([first.checkForChange(), second.checkForChange()])
    const changed = results.filter(result => result.changed)
    const lost = results.filter(result => !result.changed && result.reason === 'lost-race')

    assert.equal(changed.length, 1)
    assert.equal(lost.length, 1)
    assert.equal((await store.load()).status, 'SEVERE')
  })
})
