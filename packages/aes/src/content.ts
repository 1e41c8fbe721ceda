/**
 * Content Encryption
 *
 * Encrypted files are a 48-byte header followed by sealed chunks:
 *
 *   magic "STRA" (4) | version (1) | reserved (3) | salt (16) | nonce (16)
 *   | plaintext length (8, big-endian)
 *
 * Plaintext is cut into 64 KiB chunks. Each chunk is stored as its
 * ciphertext followed by a 16-byte tag that authenticates the header, the
 * chunk index and whether the chunk is the last one, so reordered, dropped
 * or appended chunks fail to open. The last chunk holds 1 to 64 KiB, or
 * nothing when the content is empty.
 *
 * Every scheme version uses this geometry, so the plaintext length follows
 * from the ciphertext length alone.
 */

import {
  type BinaryLike,
  type CipherGCMTypes,
  createCipheriv,
  createDecipheriv,
  createHmac,
  pbkdf2,
  randomBytes,
  scrypt,
  timingSafeEqual,
} from 'node:crypto'
import { EncryptionError } from '@strata/core'

export const MAGIC = Buffer.from('STRA', 'ascii')
export const HEADER_LENGTH = 48
export const CHUNK_SIZE = 64 * 1024
export const TAG_LENGTH = 16
const SEALED_CHUNK_SIZE = CHUNK_SIZE + TAG_LENGTH

const SALT_LENGTH = 16
const NONCE_LENGTH = 16

/** PBKDF2 iterations for version 1 keys. */
const PBKDF2_ITERATIONS = 100_000

/**
 * Content scheme version.
 * 1: PBKDF2-SHA256 key, AES-256-CTR with a truncated HMAC-SHA256 per chunk.
 * 2: scrypt key, AES-256-GCM per chunk with a STREAM nonce.
 */
export type SchemeVersion = 1 | 2

export const DEFAULT_SCHEME_VERSION: SchemeVersion = 2

export function isSchemeVersion(value: number): value is SchemeVersion {
  return value === 1 || value === 2
}

export interface ContentHeader {
  version: SchemeVersion
  salt: Buffer
  nonce: Buffer
  length: number
}

// =============================================================================
// Lengths
// =============================================================================

function chunkCount(plaintextLength: number): number {
  return plaintextLength === 0 ? 1 : Math.ceil(plaintextLength / CHUNK_SIZE)
}

export function encryptedLength(plaintextLength: number): number {
  return HEADER_LENGTH + plaintextLength + chunkCount(plaintextLength) * TAG_LENGTH
}

/**
 * @throws EncryptionError when no plaintext length maps to `length`
 */
export function plaintextLength(length: number, path?: string): number {
  const body = length - HEADER_LENGTH
  if (body < TAG_LENGTH) {
    throw new EncryptionError(`Encrypted file too short: ${length} bytes`, 'list', path)
  }
  const chunks = Math.ceil(body / SEALED_CHUNK_SIZE)
  const plaintext = body - chunks * TAG_LENGTH
  if (encryptedLength(plaintext) !== length) {
    throw new EncryptionError(`Invalid encrypted file length: ${length} bytes`, 'list', path)
  }
  return plaintext
}

// =============================================================================
// Header
// =============================================================================

export function encodeHeader(header: ContentHeader): Buffer {
  const buffer = Buffer.alloc(HEADER_LENGTH)
  MAGIC.copy(buffer, 0)
  buffer.writeUInt8(header.version, 4)
  header.salt.copy(buffer, 8)
  header.nonce.copy(buffer, 8 + SALT_LENGTH)
  buffer.writeBigUInt64BE(BigInt(header.length), 8 + SALT_LENGTH + NONCE_LENGTH)
  return buffer
}

export function decodeHeader(buffer: Buffer, path?: string): ContentHeader {
  if (buffer.length < HEADER_LENGTH || !buffer.subarray(0, 4).equals(MAGIC)) {
    throw new EncryptionError('Not an encrypted file', 'read', path)
  }
  const version = buffer.readUInt8(4)
  if (!isSchemeVersion(version)) {
    throw new EncryptionError(`Unsupported content scheme version ${version}`, 'read', path)
  }
  return {
    version,
    salt: Buffer.from(buffer.subarray(8, 8 + SALT_LENGTH)),
    nonce: Buffer.from(buffer.subarray(8 + SALT_LENGTH, 8 + SALT_LENGTH + NONCE_LENGTH)),
    length: Number(buffer.readBigUInt64BE(8 + SALT_LENGTH + NONCE_LENGTH)),
  }
}

// =============================================================================
// Chunk ciphers
// =============================================================================

interface ChunkCipher {
  seal(index: number, final: boolean, plaintext: Buffer): Buffer
  /** @throws EncryptionError when the tag does not match */
  open(index: number, final: boolean, sealed: Buffer): Buffer
}

function deriveKey(version: SchemeVersion, password: string, salt: BinaryLike): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const done = (err: Error | null, key: Buffer) => (err ? reject(err) : resolve(key))
    if (version === 1) {
      pbkdf2(password, salt, PBKDF2_ITERATIONS, 64, 'sha256', done)
    } else {
      scrypt(password, salt, 32, done)
    }
  })
}

/**
 * Version 1: one AES-256-CTR keystream over the whole content, each chunk
 * authenticated with HMAC-SHA256(header || index || final || ciphertext)
 * truncated to 16 bytes.
 */
function ctrHmacCipher(key: Buffer, header: Buffer, nonce: Buffer, path?: string): ChunkCipher {
  const encryptionKey = key.subarray(0, 32)
  const macKey = key.subarray(32)
  // CTR is symmetric; one keystream serves either direction as long as chunks stay in order
  const keystream = createCipheriv('aes-256-ctr', encryptionKey, nonce)

  const tag = (index: number, final: boolean, ciphertext: Buffer): Buffer => {
    const position = Buffer.alloc(9)
    position.writeBigUInt64BE(BigInt(index), 0)
    position.writeUInt8(final ? 1 : 0, 8)
    return createHmac('sha256', macKey)
      .update(header)
      .update(position)
      .update(ciphertext)
      .digest()
      .subarray(0, TAG_LENGTH)
  }

  return {
    seal(index, final, plaintext) {
      const ciphertext = keystream.update(plaintext)
      return Buffer.concat([ciphertext, tag(index, final, ciphertext)])
    },
    open(index, final, sealed) {
      const ciphertext = sealed.subarray(0, sealed.length - TAG_LENGTH)
      const expected = tag(index, final, ciphertext)
      if (!timingSafeEqual(expected, sealed.subarray(sealed.length - TAG_LENGTH))) {
        throw new EncryptionError(`Chunk ${index} failed its integrity check`, 'read', path)
      }
      return keystream.update(ciphertext)
    },
  }
}

/**
 * Version 2: AES-256-GCM per chunk. The 12-byte nonce is a 7-byte random
 * prefix, the chunk index (uint32) and the final flag; the header is bound
 * as additional data.
 */
function gcmStreamCipher(key: Buffer, header: Buffer, nonce: Buffer, path?: string): ChunkCipher {
  const algorithm: CipherGCMTypes = 'aes-256-gcm'
  const prefix = nonce.subarray(0, 7)

  const chunkNonce = (index: number, final: boolean): Buffer => {
    const value = Buffer.alloc(12)
    prefix.copy(value, 0)
    value.writeUInt32BE(index, 7)
    value.writeUInt8(final ? 1 : 0, 11)
    return value
  }

  return {
    seal(index, final, plaintext) {
      const cipher = createCipheriv(algorithm, key, chunkNonce(index, final), { authTagLength: TAG_LENGTH })
      cipher.setAAD(header)
      const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()])
      return Buffer.concat([ciphertext, cipher.getAuthTag()])
    },
    open(index, final, sealed) {
      const decipher = createDecipheriv(algorithm, key, chunkNonce(index, final), { authTagLength: TAG_LENGTH })
      decipher.setAAD(header)
      decipher.setAuthTag(sealed.subarray(sealed.length - TAG_LENGTH))
      try {
        return Buffer.concat([decipher.update(sealed.subarray(0, sealed.length - TAG_LENGTH)), decipher.final()])
      } catch (err) {
        throw new EncryptionError(`Chunk ${index} failed its integrity check`, 'read', path, { cause: err })
      }
    },
  }
}

async function createChunkCipher(
  header: ContentHeader,
  encodedHeader: Buffer,
  password: string,
  path?: string,
): Promise<ChunkCipher> {
  const key = await deriveKey(header.version, password, header.salt)
  return header.version === 1
    ? ctrHmacCipher(key, encodedHeader, header.nonce, path)
    : gcmStreamCipher(key, encodedHeader, header.nonce, path)
}

// =============================================================================
// Streams
// =============================================================================

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk
  if (chunk instanceof Uint8Array || typeof chunk === 'string') return Buffer.from(chunk)
  throw new TypeError('Expected binary stream content')
}

export interface EncryptOptions {
  password: string
  /** Plaintext length, written to the header and checked against the stream. */
  length: number
  /** @default 2 */
  version?: SchemeVersion
  /** Item path for error messages. */
  path?: string
}

/**
 * Encrypt a plaintext stream. Yields the header, then one sealed chunk at a time.
 *
 * @throws EncryptionError when the stream length differs from `length`
 */
export async function* encryptContent(
  source: AsyncIterable<unknown>,
  options: EncryptOptions,
): AsyncGenerator<Buffer> {
  const header: ContentHeader = {
    version: options.version ?? DEFAULT_SCHEME_VERSION,
    salt: randomBytes(SALT_LENGTH),
    nonce: randomBytes(NONCE_LENGTH),
    length: options.length,
  }
  const encodedHeader = encodeHeader(header)
  const cipher = await createChunkCipher(header, encodedHeader, options.password, options.path)
  yield encodedHeader

  let pending: Buffer = Buffer.alloc(0)
  let index = 0
  let total = 0
  for await (const chunk of source) {
    const buffer = toBuffer(chunk)
    total += buffer.length
    pending = pending.length > 0 ? Buffer.concat([pending, buffer]) : buffer
    // Keep at least one byte back so the last chunk can be sealed as final
    while (pending.length > CHUNK_SIZE) {
      yield cipher.seal(index++, false, pending.subarray(0, CHUNK_SIZE))
      pending = pending.subarray(CHUNK_SIZE)
    }
  }

  if (total !== options.length) {
    throw new EncryptionError(
      `Expected ${options.length} bytes of content, received ${total}`,
      'createFile',
      options.path,
    )
  }
  yield cipher.seal(index, true, pending)
}

export interface DecryptOptions {
  password: string
  path?: string
}

/**
 * Decrypt a stream written by `encryptContent`, using the scheme named in its header.
 *
 * @throws EncryptionError for a foreign, truncated or tampered stream
 */
export async function* decryptContent(
  source: AsyncIterable<unknown>,
  options: DecryptOptions,
): AsyncGenerator<Buffer> {
  let buffer = Buffer.alloc(0)
  let header: ContentHeader | undefined
  let cipher: ChunkCipher | undefined
  let index = 0
  let produced = 0

  for await (const chunk of source) {
    buffer = Buffer.concat([buffer, toBuffer(chunk)])

    if (!cipher) {
      if (buffer.length < HEADER_LENGTH) continue
      const encodedHeader = Buffer.from(buffer.subarray(0, HEADER_LENGTH))
      header = decodeHeader(encodedHeader, options.path)
      cipher = await createChunkCipher(header, encodedHeader, options.password, options.path)
      buffer = buffer.subarray(HEADER_LENGTH)
    }

    // A full sealed chunk followed by more data cannot be the last one
    while (buffer.length > SEALED_CHUNK_SIZE) {
      const plaintext = cipher.open(index++, false, buffer.subarray(0, SEALED_CHUNK_SIZE))
      produced += plaintext.length
      buffer = buffer.subarray(SEALED_CHUNK_SIZE)
      yield plaintext
    }
  }

  if (!cipher || !header) {
    throw new EncryptionError('Encrypted file is truncated', 'read', options.path)
  }
  if (buffer.length < TAG_LENGTH) {
    throw new EncryptionError('Encrypted file is truncated', 'read', options.path)
  }
  const last = cipher.open(index, true, buffer)
  produced += last.length
  if (produced !== header.length) {
    throw new EncryptionError(
      `Decrypted ${produced} bytes, header declares ${header.length}`,
      'read',
      options.path,
    )
  }
  yield last
}
