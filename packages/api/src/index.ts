export { createApp } from './app';
export type { AppEnv, AppServices } from './context';
export { createServices, startServer, type RunningServer } from './server';
