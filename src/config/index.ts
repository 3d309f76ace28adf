export type { AppConfig, DatabaseConfig, RateLimitConfig, StoreBackend } from './config.js';
export { ConfigError, loadConfig, loadDatabaseConfig } from './config.js';
