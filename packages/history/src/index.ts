export { JsonFileHistory, parseHistory } from './json-file'
export type { JsonFileHistoryConfig } from './json-file'
export { BufferHistory } from './buffer'
export type { BufferHistoryConfig } from './buffer'
export { PERSIST_FILE, createHistoryStore, resolveHistoryPath } from './paths'
export type { HistoryPathEnv } from './paths'
