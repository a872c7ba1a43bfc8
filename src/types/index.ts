export type AlertLevelCode = 'LOW' | 'GUARDED' | 'ELEVATED' | 'HIGH' | 'SEVERE'

export interface AlertLevel {
  code: AlertLevelCode
  title: string
  color: string
  text: string
  img: string
}

export interface StatusRecord {
  id: 1
  status: string
  updated: string | null
}

export interface Subscriber {
  id: number
  teamId: string
  channelId: string
  encryptedUrl: string
  added: string
  lastNotified: string | null
  inactive: boolean
}

export interface SubscriberRegistrationInput {
  teamId: string
  channelId: string
  url: string
}

export type TriggerReason = 'startup' | 'scheduled' | 'queue' | 'manual'

export type DeliveryOutcome = 'skipped' | 'delivered' | 'deactivated' | 'failed'

export interface DeliverySummary {
  selected: number
  delivered: number
  deactivated: number
  failed: number
}

/** A committed status with its resolved level, as delivered to subscribers. */
export interface StatusSnapshot {
  status: string
  level: AlertLevel
  updated: string
}
