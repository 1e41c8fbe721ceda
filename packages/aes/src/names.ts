/**
 * Name Encryption
 *
 * Deterministic AES-256-CBC: the IV is the first 16 bytes of an HMAC-SHA256
 * over the plaintext name, so the same name always encrypts to the same
 * string and a lookup by name keeps working. Output is base64url of
 * `iv || ciphertext`, which never contains a path separator.
 */

import { createCipheriv, createDecipheriv, createHmac, scryptSync, timingSafeEqual } from 'node:crypto'
import { EncryptionError } from '@strata/core'

const NAME_KEY_SALT = Buffer.from('strata/name-key/v1')
const IV_LENGTH = 16
const BLOCK_LENGTH = 16

export class NameCipher {
  private readonly encryptionKey: Buffer
  private readonly macKey: Buffer

  constructor(password: string) {
    const key = scryptSync(password, NAME_KEY_SALT, 64)
    this.encryptionKey = key.subarray(0, 32)
    this.macKey = key.subarray(32)
  }

  encrypt(name: string): string {
    const plaintext = Buffer.from(name, 'utf8')
    const iv = this.syntheticIv(plaintext)
    const cipher = createCipheriv('aes-256-cbc', this.encryptionKey, iv)
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()])
    return Buffer.concat([iv, ciphertext]).toString('base64url')
  }

  /**
   * @throws EncryptionError when `encoded` was not produced with this key
   */
  decrypt(encoded: string, path?: string): string {
    const data = Buffer.from(encoded, 'base64url')
    if (
      data.toString('base64url') !== encoded ||
      data.length < IV_LENGTH + BLOCK_LENGTH ||
      data.length % BLOCK_LENGTH !== 0
    ) {
      throw new EncryptionError(`Not an encrypted name: ${encoded}`, 'list', path)
    }

    const iv = data.subarray(0, IV_LENGTH)
    let plaintext: Buffer
    try {
      const decipher = createDecipheriv('aes-256-cbc', this.encryptionKey, iv)
      plaintext = Buffer.concat([decipher.update(data.subarray(IV_LENGTH)), decipher.final()])
    } catch (err) {
      throw new EncryptionError(`Cannot decrypt name: ${encoded}`, 'list', path, { cause: err })
    }

    if (!timingSafeEqual(this.syntheticIv(plaintext), iv)) {
      throw new EncryptionError(`Name failed its integrity check: ${encoded}`, 'list', path)
    }
    return plaintext.toString('utf8')
  }

  private syntheticIv(plaintext: Buffer): Buffer {
    return createHmac('sha256', this.macKey).update(plaintext).digest().subarray(0, IV_LENGTH)
  }
}
