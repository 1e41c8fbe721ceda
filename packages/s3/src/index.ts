export { MTIME_METADATA_KEY, S3Storage, type S3StorageConfig, toPrefix } from './s3-storage'
