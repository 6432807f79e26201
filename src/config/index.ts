export * from './types';
export * from './environments';
export { loadConfigFromEnv, optionsFromEnv } from './env';
