import { SERVICE } from './config.js';
import type { ExporterService } from './service.js';
import { errorMessage } from './log.js';

export function registerShutdown(service: ExporterService): void {
  const shutdown = (signal: string) => {
    console.log(`[${SERVICE}] received ${signal}, shutting down...`);
    service.stop().then(
      () => process.exit(0),
      (error) => {
        console.warn(`[${SERVICE}] Error during shutdown:`, errorMessage(error));
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}
