export * from './json-file-persistence';
export * from './memory-persistence';
export * from './persistence';
export * from './resource-store';
export * from './seed';
