export type { KeyValueStorage } from './types';
export { MemoryStorage } from './memory';
