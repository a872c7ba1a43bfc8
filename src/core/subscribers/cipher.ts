import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto'

const ALGORITHM = 'aes-256-gcm'
const KEY_BYTES = 32
const IV_BYTES = 12
const VERSION = 'v1'

/**
 * Symmetric encryption for subscriber delivery URLs. Tokens look like
 * `v1.<iv>.<tag>.<ciphertext>`, each part base64url encoded.
 */
export class UrlCipher {
  private readonly key: Buffer

  constructor(key: string) {
    const decoded = Buffer.from(key.trim(), 'base64')
    if (decoded.length !== KEY_BYTES) {
      throw new Error(`TOKEN_KEY must be base64 for exactly ${KEY_BYTES} bytes (got ${decoded.length})`)
    }
    this.key = decoded
  }

  static generateKey(): string {
    return randomBytes(KEY_BYTES).toString('base64')
  }

  encrypt(plaintext: string): string {
    const iv = randomBytes(IV_BYTES)
    const cipher = createCipheriv(ALGORITHM, this.key, iv)
    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()])
    const tag = cipher.getAuthTag()
    return [VERSION, iv, tag, ciphertext]
      .map(part => (typeof part === 'string' ? part : part.toString('base64url')))
      .join('.')
  }

  decrypt(token: string): string {
    const parts = token.split('.')
    const [version, iv, tag, ciphertext] = parts
    if (parts.length !== 4 || version !== VERSION || !iv || !tag || ciphertext === undefined) {
      throw new Error('Unrecognized encrypted URL format')
    }
    const decipher = createDecipheriv(ALGORITHM, this.key, Buffer.from(iv, 'base64url'))
    decipher.setAuthTag(Buffer.from(tag, 'base64url'))
    return Buffer.concat([
      decipher.update(Buffer.from(ciphertext, 'base64url')),
      decipher.final(),
    ]).toString('utf8')
  }
}
