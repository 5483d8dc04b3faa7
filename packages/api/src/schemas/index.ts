export * from './convert';
export * from './health';
