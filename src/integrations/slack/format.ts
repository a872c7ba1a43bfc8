import type { AlertLevel } from '../../types/index.js'
import { toUnixSeconds } from '../../utils/time.js'

export const AUTHOR_NAME = 'French Toast Alert System'

export interface SlackAttachment {
  color: string
  author_name: string
  author_link: string
  title: string
  text: string
  thumb_url: string
  ts: number
}

export interface SlackMessage {
  attachments: SlackAttachment[]
}

export function buildAlertMessage(level: AlertLevel, updated: string, linkUrl: string): SlackMessage {
  return {
    attachments: [
      {
        color: level.color,
        author_name: AUTHOR_NAME,
        author_link: linkUrl,
        title: level.title,
        text: level.text,
        thumb_url: level.img,
        ts: toUnixSeconds(updated),
      },
    ],
  }
}
