export { AesStorage, type AesStorageConfig } from './aes-storage'
export {
  CHUNK_SIZE,
  type ContentHeader,
  DEFAULT_SCHEME_VERSION,
  type DecryptOptions,
  type EncryptOptions,
  HEADER_LENGTH,
  type SchemeVersion,
  TAG_LENGTH,
  decodeHeader,
  decryptContent,
  encodeHeader,
  encryptContent,
  encryptedLength,
  isSchemeVersion,
  plaintextLength,
} from './content'
export { NameCipher } from './names'
