import express, { Application, NextFunction, Request, Response } from 'express';
import { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { generateCorrelationId, logger, withCorrelationAsync } from '../logging/index.js';
import { EXPOSITION_CONTENT_TYPE } from '../metrics/exposition.js';
import type { MetricsPipeline } from '../metrics/pipeline.js';

const log = logger.child('ExporterServer');

export const METRICS_PATH = '/metrics';

export interface ExporterServerConfig {
  port: number;
  host: string;
  pipeline: Pick<MetricsPipeline, 'scrape'>;
}

/**
 * HTTP surface of the exporter. Serves the exposition on GET /metrics and
 * nothing else: every other path or method is a bare 404, and any failure
 * while producing the body is a bare 500.
 */
export class ExporterServer {
  private app: Application;
  private server: Server | null = null;
  private config: ExporterServerConfig;

  constructor(config: ExporterServerConfig) {
    this.config = config;
    this.app = express();
    this.app.disable('x-powered-by');
    // Only the exact path is served: no /METRICS, no trailing slash
    this.app.set('case sensitive routing', true);
    this.app.set('strict routing', true);
    this.setupRoutes();
  }

  private setupRoutes(): void {
    const notFound = (_req: Request, res: Response): void => {
      res.status(404).end();
    };

    // Express answers HEAD through GET routes unless HEAD is routed first
    this.app.head(METRICS_PATH, notFound);
    this.app.get(METRICS_PATH, this.handleMetrics.bind(this));

    this.app.use(notFound);

    this.app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
      log.error('Unhandled request error', err);
      if (!res.headersSent) {
        res.status(500).end();
      }
    });
  }

  private async handleMetrics(_req: Request, res: Response): Promise<void> {
    const correlationId = generateCorrelationId();

    await withCorrelationAsync(correlationId, async () => {
      try {
        const body = await this.config.pipeline.scrape();
        // A Buffer keeps Express from rewriting the content type parameters
        res.status(200).set('Content-Type', EXPOSITION_CONTENT_TYPE).send(Buffer.from(body, 'utf-8'));
      } catch (error) {
        log.error('Failed to serve metrics', error instanceof Error ? error : { error: String(error) });
        res.status(500).end();
      }
    });
  }

  async start(): Promise<void> {
    if (this.server) {
      return;
    }

    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, this.config.host, () => {
        const address = server.address();
        const port = typeof address === 'object' && address ? address.port : this.config.port;
        log.info(`Listening on http://${this.config.host}:${port}${METRICS_PATH}`);
        resolve();
      });

      server.on('error', (error) => {
        this.server = null;
        reject(error);
      });

      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
        } else {
          this.server = null;
          resolve();
        }
      });
    });
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  getApp(): Application {
    return this.app;
  }

  getAddress(): AddressInfo | null {
    const address = this.server?.address();
    return typeof address === 'object' && address ? address : null;
  }
}
