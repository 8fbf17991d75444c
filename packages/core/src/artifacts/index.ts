export { ArtifactStore, safeRelativePath } from "./store.js";
export type { ArtifactInfo, ArtifactSet, NewArtifactSet } from "./store.js";
export { MemoryCacheStore, FileCacheStore } from "./cache.js";
export type { CacheStore, CacheEntry } from "./cache.js";
export { ArtifactBroker } from "./broker.js";
export type { BrokerOptions, RestoredCache } from "./broker.js";
