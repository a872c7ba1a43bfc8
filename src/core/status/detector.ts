import type { StatusRecord, StatusSnapshot } from '../../types/index.js'
import type { DiagnosticReporter } from '../diagnostics/reporter.js'
import { SourceError, UnknownLevelError } from '../errors.js'
import type { StatusSource } from '../../integrations/toast/source.js'
import { logger as rootLogger } from '../../utils/logger.js'
import { nowIso } from '../../utils/time.js'
import { normalizeStatusCode, resolveAlertLevel } from '../alerts/levels.js'
import type { StatusStore } from './store.js'

const logger = rootLogger.child('change-detector')

export type NoChangeReason = 'fetch-failed' | 'unknown-level' | 'unchanged' | 'lost-race'

export type ChangeCheckResult =
  | { changed: true; previous: StatusRecord; snapshot: StatusSnapshot }
  | { changed: false; reason: NoChangeReason; current: StatusRecord }

export interface ChangeDetectorOptions {
  source: StatusSource
  store: StatusStore
  reporter: DiagnosticReporter
  clock?: () => string
}

export class ChangeDetector {
  private readonly source: StatusSource
  private readonly store: StatusStore
  private readonly reporter: DiagnosticReporter
  private readonly clock: () => string

  constructor(options: ChangeDetectorOptions) {
    this.source = options.source
    this.store = options.store
    this.reporter = options.reporter
    this.clock = options.clock ?? nowIso
  }

  async checkForChange(): Promise<ChangeCheckResult> {
    const current = await this.store.load()

    let fetched: string
    try {
      fetched = normalizeStatusCode(await this.source.fetch())
    }
    catch (error) {
      if (!(error instanceof SourceError)) throw error
      this.reporter.report(error.kind === 'malformed' ? 'invalid_xml_status' : 'status_fetch_failed', {
        kind: error.kind,
        httpStatus: error.httpStatus,
        error: error.message,
      })
      return { changed: false, reason: 'fetch-failed', current }
    }

    const level = resolveAlertLevel(fetched)
    if (!level) {
      const unknown = new UnknownLevelError(fetched)
      this.reporter.report('unknown_status', {
        status: unknown.status,
        current: current.status,
        error: unknown.message,
      })
      return { changed: false, reason: 'unknown-level', current }
    }

    logger.info('Status checked', { current: current.status || '(none)', fetched })

    if (normalizeStatusCode(current.status) === fetched) {
      return { changed: false, reason: 'unchanged', current }
    }

    const result = await this.store.commitChange(fetched, this.clock())
    if (!result.committed || result.record.updated === null) {
      logger.info('Status change already committed by another run', { status: fetched })
      return { changed: false, reason: 'lost-race', current: result.record }
    }

    logger.warn('New status', { previous: current.status || '(none)', status: fetched })
    return {
      changed: true,
      previous: current,
      snapshot: { status: fetched, level, updated: result.record.updated },
    }
  }
}
