export { buildApp } from './app.js';
export type { AppOptions } from './app.js';
export { loadConfig } from './config.js';
export type { ServerConfig } from './config.js';
export { ConfigError, InvalidRequestError, InvalidUploadError } from './errors.js';
export { streamProgress } from './routes/progressStream.js';
export type { ProgressStreamOptions } from './routes/progressStream.js';
export { APP_VERSION } from './version.js';
