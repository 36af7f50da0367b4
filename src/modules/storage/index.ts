export { createDatabase, type Database } from './database';
export { migrate } from './migrations';
export { EntityStore, type ListOptions, type NewMessage, type Page } from './entity-store';
export { LocalBlobStore, MemoryBlobStore, type BlobStore } from './blob-store';
