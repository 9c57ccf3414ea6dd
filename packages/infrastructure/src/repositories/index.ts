export * from './YamlRecordStore.js';
export * from './InMemoryRecordStore.js';
