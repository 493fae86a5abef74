export * from './context';
export * from './ingest';
export * from './lookup';
export * from './search';
export * from './health';
