/**
 * Configuration module for chanseal.
 */

export { ChansealConfig, DEFAULT_MAX_PLAINTEXT_BYTES } from './settings';
export type { ChansealConfigOptions } from './settings';

export { ConfigLoader, ConfigError, createConfigLoader } from './file-config';
export type { ConfigLoaderOptions } from './file-config';
