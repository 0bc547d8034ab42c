import { env } from './env.js';

export { env, parseEnv } from './env.js';
export type { AppEnvironment, ParsedEnvironment } from './env.js';

// Commonly used store settings
export const defaultStoreRoot = () => env.BLOB_STORE_PATH;
