import { startServer } from './server.js';
import { createLogger } from './logging/index.js';

startServer().catch((err: unknown) => {
  createLogger().fatal('Failed to start', err instanceof Error ? err : new Error(String(err)));
  process.exit(1);
});
