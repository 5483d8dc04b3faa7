export * from './types';
export * from './errors';
export * from './logger';
export * from './config';
export * from './latex';
export * from './image';
export * from './vision';
export * from './converter';

export const VERSION = '0.1.0';
