// src/core/search/index.ts
export { search, findDataByPattern, getAllKeys } from './query.js';
export { walkEntries, joinPath, isJsonObject } from './walk.js';
export type { KeyEntry } from './walk.js';
