/** Reported by `GET /health`. Kept in step with package.json. */
export const APP_VERSION = '1.0.0';
