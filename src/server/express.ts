/**
 * Express REST API Server
 * Serves the games, categories and publishers endpoints
 */

import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import { createServer, type Server as HttpServer } from 'http';
import { createCategoriesRouter } from '../routes/categories.js';
import { createRouteContext } from '../routes/context.js';
import { createGamesRouter } from '../routes/games.js';
import { createPublishersRouter } from '../routes/publishers.js';
import { errorHandler, notFoundHandler } from './error-handler.js';
import type { DatabaseManager } from '../storage/sqlite.js';

// ============================================
// Types
// ============================================

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigins: string[];
}

// ============================================
// API Server
// ============================================

export class ApiServer {
  private app: Express;
  private server: HttpServer;
  private config: ServerConfig;
  private database: DatabaseManager;

  constructor(database: DatabaseManager, config: Partial<ServerConfig> = {}) {
    this.config = {
      port: 5100,
      host: 'localhost',
      corsOrigins: ['http://localhost:4321'],
      ...config,
    };
    this.database = database;

    this.app = express();
    this.server = createServer(this.app);

    this.setupMiddleware();
    this.setupRoutes();
  }

  // ----------------------------------------
  // Middleware
  // ----------------------------------------

  private setupMiddleware(): void {
    this.app.use(cors({
      origin: this.config.corsOrigins,
    }));
    this.app.use(express.json());
  }

  // ----------------------------------------
  // Routes
  // ----------------------------------------

  private setupRoutes(): void {
    const ctx = createRouteContext(this.database);

    // Health check
    this.app.get('/api/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', timestamp: Date.now() });
    });

    this.app.use('/api/games', createGamesRouter(ctx));
    this.app.use('/api/categories', createCategoriesRouter(ctx));
    this.app.use('/api/publishers', createPublishersRouter(ctx));

    this.app.use(notFoundHandler);
    this.app.use(errorHandler);
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.config.port, this.config.host, () => {
        this.server.off('error', reject);
        console.log(`API server running at http://${this.config.host}:${this.config.port}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.server.listening) {
      return;
    }

    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /** The Express application, for mounting in tests without listening */
  getApp(): Express {
    return this.app;
  }
}
