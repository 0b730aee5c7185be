import express, { Express, Request, Response, NextFunction } from 'express';
import http from 'http';
import { logger } from './utils/logger';
import { NotFoundError } from './utils/errors';
import { ListenAddress } from './utils/addressUtils';
import { DashboardService } from './services/dashboard/DashboardService';
import { errorHandler, requestLogger } from './api/middleware/errorHandler';
import { createDashboardRouter } from './api/routes/dashboard';
import { AssetTable, createAssetsRouter } from './api/routes/assets';
import healthRouter from './api/routes/health';

export interface DashboardServerOptions {
  dashboardService: DashboardService;
  assets: AssetTable;
}

export class DashboardServer {
  private app: Express;
  private server: http.Server;

  constructor(options: DashboardServerOptions) {
    this.app = express();
    this.app.disable('x-powered-by');
    this.server = http.createServer(this.app);
    this.setupRoutes(options);
  }

  private setupRoutes(options: DashboardServerOptions): void {
    this.app.use(requestLogger);

    this.app.use('/health', healthRouter);
    this.app.use(createAssetsRouter(options.assets));
    this.app.use(createDashboardRouter(options.dashboardService));

    this.app.use((req: Request, res: Response, next: NextFunction) => {
      next(new NotFoundError());
    });
    this.app.use(errorHandler);
  }

  getApp(): Express {
    return this.app;
  }

  async start(address: ListenAddress): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error) => {
        logger.error('Web server error', { error: error.message });
        reject(error);
      };
      this.server.once('error', onError);

      this.server.listen(address.port, address.host, () => {
        this.server.off('error', onError);
        logger.info(`Dashboard listening on ${address.host ?? '*'}:${address.port}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        logger.info('Web server stopped');
        resolve();
      });
    });
  }
}
