export { LocalStorage, type LocalStorageConfig } from './local-storage'
