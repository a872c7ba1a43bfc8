import { SourceError } from '../../core/errors.js'
import { logger as rootLogger } from '../../utils/logger.js'

const logger = rootLogger.child('status-source')

const USER_AGENT = 'french-toast-alerts/0.1'
const XML_ACCEPT = 'application/xml,text/xml;q=0.9,*/*;q=0.5'

export interface StatusSource {
  fetch(): Promise<string>
}

export interface ToastStatusSourceOptions {
  url: string
  timeoutMs: number
  fetchImpl?: typeof fetch
}

function decodeXmlEntities(value: string): string {
  return value
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, '\'')
    .replace(/&#39;/g, '\'')
    .replace(/&amp;/g, '&')
}

// CDATA sections are literal; entities are decoded only outside them.
function decodeElementText(raw: string): string {
  return raw
    .split(/(<!\[CDATA\[[\s\S]*?\]\]>)/)
    .map(part => part.startsWith('<![CDATA[')
      ? part.slice('<![CDATA['.length, -']]>'.length)
      : decodeXmlEntities(part.replace(/<[^>]*>/g, '')))
    .join('')
}

// Markup that never changes element depth, then start, end and empty-element tags.
const XML_TOKEN = /<!\[CDATA\[[\s\S]*?\]\]>|<!--[\s\S]*?-->|<[?!][\s\S]*?>|<(\/?)([A-Za-z_][\w.:-]*)[^>]*?(\/?)>/g

/**
 * Text of the first `<status>` element directly under the document root, or
 * undefined when there is none or it is empty. Nested `<status>` elements are
 * ignored.
 */
export function extractStatus(xml: string): string | undefined {
  let depth = 0
  let contentStart = -1

  for (const match of xml.matchAll(XML_TOKEN)) {
    const [token, closing, name, selfClosing] = match
    if (name === undefined) continue
    const index = match.index ?? 0

    if (closing) {
      depth -= 1
      if (contentStart >= 0 && depth === 1 && name === 'status') {
        const value = decodeElementText(xml.slice(contentStart, index)).trim()
        return value.length > 0 ? value : undefined
      }
      continue
    }

    if (depth === 1 && contentStart < 0 && name === 'status') {
      if (selfClosing) return undefined
      contentStart = index + token.length
    }
    if (!selfClosing) depth += 1
  }
  return undefined
}

export class ToastStatusSource implements StatusSource {
  private readonly url: string
  private readonly timeoutMs: number
  private readonly fetchImpl: typeof fetch

  constructor(options: ToastStatusSourceOptions) {
    this.url = options.url
    this.timeoutMs = options.timeoutMs
    this.fetchImpl = options.fetchImpl ?? fetch
  }

  async fetch(): Promise<string> {
    logger.debug('Status feed request', { url: this.url, timeoutMs: this.timeoutMs })

    const controller = new AbortController()
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs)

    let text: string
    try {
      const response = await this.fetchImpl(this.url, {
        method: 'GET',
        headers: {
          accept: XML_ACCEPT,
          'user-agent': USER_AGENT,
        },
        signal: controller.signal,
      })
      text = await response.text()

      logger.debug('Status feed response', { status: response.status, ok: response.ok })

      if (!response.ok) {
        const preview = text.length > 180 ? `${text.slice(0, 180)}...` : text
        throw new SourceError('network', `HTTP ${response.status}: ${preview}`, { httpStatus: response.status })
      }
    }
    catch (error) {
      if (error instanceof SourceError) throw error
      const message = controller.signal.aborted
        ? `Request timed out after ${this.timeoutMs}ms`
        : error instanceof Error ? error.message : String(error)
      throw new SourceError('network', message, { cause: error })
    }
    finally {
      clearTimeout(timeout)
    }

    const status = extractStatus(text)
    if (!status) {
      throw new SourceError('malformed', 'Status element missing or empty')
    }
    return status.toUpperCase()
  }
}
