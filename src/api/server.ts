import { createServer, type Server } from 'node:http';
import cors from 'cors';
import express, { type Express } from 'express';
import { configManager } from '../config/manager.js';
import { createLogger } from '../utils/logger.js';
import { createRouter, type RouterDeps } from './routes.js';

const log = createLogger('api-server');

export function createApp(deps: RouterDeps): Express {
  const app = express();

  const corsOrigins = process.env.CORS_ORIGINS
    ? process.env.CORS_ORIGINS.split(',').map((s) => s.trim())
    : ['http://localhost:3000'];
  app.use(
    cors({
      origin: corsOrigins,
      methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
    }),
  );
  app.use(express.json({ limit: '1mb' }));
  app.use(createRouter(deps));

  return app;
}

export class ApiServer {
  private server: Server;
  private port: number;

  constructor(deps: RouterDeps, port = configManager.get<number>('api.port')) {
    this.port = port;
    this.server = createServer(createApp(deps));
  }

  start(): Promise<void> {
    return new Promise((resolve) => {
      this.server.listen(this.port, () => {
        log.info({ port: this.port }, 'API server started');
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else {
          log.info('API server stopped');
          resolve();
        }
      });
    });
  }
}
