import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import morgan from 'morgan';
import http, { type Server } from 'http';
import type { MetricRegistry } from './metrics.js';
import { log, errorMessage } from './log.js';

export interface ScrapeStatus {
  eventsProcessed(): number;
  cacheEntries(): { zones: number; devices: number };
  messageTypeSummary(): Record<string, number>;
  communicationSummary(): Record<string, number>;
}

export interface MetricsAppOptions {
  accessLog?: boolean;
}

/** Read-only scrape surface: Prometheus text, liveness and a JSON traffic summary. */
export function createMetricsApp(metrics: MetricRegistry, status: ScrapeStatus, options: MetricsAppOptions = {}): Express {
  const app = express();
  app.disable('x-powered-by');
  if (options.accessLog) app.use(morgan('combined'));

  app.get('/metrics', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const body = await metrics.metrics();
      res.set('Content-Type', metrics.contentType);
      res.send(body);
    } catch (error) {
      next(error);
    }
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      eventsProcessed: status.eventsProcessed(),
      cacheEntries: status.cacheEntries(),
    });
  });

  app.get('/summary', (_req: Request, res: Response) => {
    res.json({
      messageTypes: status.messageTypeSummary(),
      deviceCommunications: status.communicationSummary(),
    });
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).send('not found');
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    log.error(`http error: ${errorMessage(err)}`);
    res.status(500).send(`server error: ${errorMessage(err)}`);
  });

  return app;
}

/** Resolves once listening; a bind failure (port in use, no permission) rejects. */
export function listen(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = http.createServer(app);
    const onError = (err: Error) => {
      server.off('listening', onListening);
      reject(err);
    };
    const onListening = () => {
      server.off('error', onError);
      server.on('error', (err) => log.error('http error', err));
      resolve(server);
    };
    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(port, host);
  });
}

export function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
