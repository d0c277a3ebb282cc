import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { createLogger, ValidationError } from '@timbre/core';
import type { VoiceConversionService } from './pipeline/conversion-service';
import { toErrorResponse } from './pipeline/conversion-service';
import { createConversionRouter } from './routes/conversion-routes';

const logger = createLogger('voice-conversion-server');

export const SERVICE_NAME = 'voice-conversion';
export const SERVICE_VERSION = '0.1.0';

export interface ServerOptions {
  corsOrigins: string[] | '*';
  maxUploadBytes: number;
}

/**
 * HTTP server for voice conversion
 */
export class VoiceConversionServer {
  private app: express.Application;
  private service: VoiceConversionService;
  private options: ServerOptions;
  private server: Server | null = null;

  constructor(service: VoiceConversionService, options: ServerOptions) {
    this.app = express();
    this.service = service;
    this.options = options;

    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  get application(): express.Application {
    return this.app;
  }

  private setupMiddleware() {
    this.app.use(cors({
      origin: this.options.corsOrigins === '*' ? true : this.options.corsOrigins,
      credentials: true
    }));
    // base64 audio inflates by a third
    this.app.use(express.json({ limit: Math.ceil(this.options.maxUploadBytes * 4 / 3) * 2 }));
  }

  private setupRoutes() {
    /**
     * GET /
     * Service description
     */
    this.app.get('/', (req: Request, res: Response) => {
      res.json({
        service: SERVICE_NAME,
        version: SERVICE_VERSION,
        features: [
          'silence-aware chunking of long sources',
          'bounded concurrent jobs over one engine',
          'streaming and full outputs',
          'wav, mp3 and ogg output'
        ],
        endpoints: {
          health: 'GET /health',
          convert: 'POST /convert',
          convert_files: 'POST /convert/files',
          job: 'GET /jobs/:id',
          job_stream: 'GET /jobs/:id/stream',
          cancel: 'DELETE /jobs/:id',
          download: 'GET /download/:jobId/:file',
          cleanup: 'DELETE /cleanup/:jobId'
        }
      });
    });

    /**
     * GET /health
     * Engine and scheduler status
     */
    this.app.get('/health', (req: Request, res: Response) => {
      res.json({
        service: SERVICE_NAME,
        ...this.service.health()
      });
    });

    this.app.use(createConversionRouter(this.service, {
      maxUploadBytes: this.options.maxUploadBytes
    }));
  }

  private setupErrorHandling() {
    // Body parsing and upload failures arrive here before the service sees the request
    this.app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(error);
        return;
      }

      const outcome = toErrorResponse(toRequestError(error));
      res.status(outcome.statusCode).json(outcome.body);
    });
  }

  /**
   * Start listening; port 0 picks a free port
   */
  async start(port: number, host?: string): Promise<AddressInfo> {
    await this.service.initialize();

    const server = await new Promise<Server>((resolve, reject) => {
      const listening = this.app.listen(port, host ?? '0.0.0.0', () => resolve(listening));
      listening.once('error', reject);
    });
    this.server = server;

    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }

    logger.info({ port: address.port, host: address.address }, 'Voice conversion server started');
    return address;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });

    logger.info('Voice conversion server stopped');
  }
}

function toRequestError(error: unknown): unknown {
  if (error instanceof multer.MulterError) {
    return new ValidationError(`Upload rejected: ${error.message}`, { field: error.field });
  }
  if (error instanceof SyntaxError) {
    return new ValidationError('Malformed JSON body');
  }
  if (error instanceof Error && 'type' in error && error.type === 'entity.too.large') {
    return new ValidationError('Request body is too large');
  }
  return error;
}
