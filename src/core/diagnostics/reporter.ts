import { logger as rootLogger } from '../../utils/logger.js'
import type { Logger } from '../../utils/logger.js'

export type DiagnosticEventName =
  | 'status_fetch_failed'
  | 'invalid_xml_status'
  | 'unknown_status'
  | 'subscriber_marked_inactive'
  | 'bad_delivery_response'
  | 'delivery_request_failed'
  | 'subscriber_added'
  | 'subscriber_updated'

export type DiagnosticPayload = Record<string, unknown>

export interface DiagnosticReporter {
  report(name: DiagnosticEventName, payload: DiagnosticPayload): void
}

/**
 * Writes diagnostic events to the log. Registration events are informational,
 * everything else is a failure surfaced at `warn`.
 */
export class LoggerDiagnosticReporter implements DiagnosticReporter {
  private readonly logger: Logger

  constructor(logger: Logger = rootLogger.child('diagnostics')) {
    this.logger = logger
  }

  report(name: DiagnosticEventName, payload: DiagnosticPayload): void {
    if (name === 'subscriber_added' || name === 'subscriber_updated') {
      this.logger.info(name, payload)
      return
    }
    this.logger.warn(name, payload)
  }
}
