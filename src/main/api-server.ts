import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';

import express, { Express, Request, Response, NextFunction } from 'express';

import { HTTP } from '../constants';

import { AccessKeyGuard } from './access-key';
import { APIRouteHandlers } from './api-route-handlers';
import type { ConfigManager } from './config/config-manager';
import { describeRequestBodyError, toApiError } from './error-normalizer';
import { Housekeeping } from './housekeeping';
import type { Logger } from './logging/logger';
import { StateStoreError } from './state/errors';
import type { StateCoordinator } from './state/state-coordinator';

export interface DashboardServerDeps {
  coordinator: StateCoordinator;
  config: ConfigManager;
  logger: Logger;
  /** Built from the other deps when omitted */
  housekeeping?: Housekeeping;
}

export interface DashboardServerOptions {
  host?: string;
  /** 0 binds an ephemeral port */
  port?: number;
  /** Directory served under /charts; defaults to the configured artifact directory */
  artifactDir?: string;
  /** Largest accepted submission, measured after gzip inflation */
  maxBodyBytes?: number;
}

type AsyncRoute = (req: Request, res: Response) => Promise<unknown>;

export class DashboardAPIServer {
  private readonly app: Express;
  private readonly accessKey: AccessKeyGuard;
  private readonly housekeeping: Housekeeping;
  private readonly routeHandlers: APIRouteHandlers;
  private server: Server | null = null;
  private readonly host: string;
  private readonly port: number;

  constructor(private readonly deps: DashboardServerDeps, private readonly options: DashboardServerOptions = {}) {
    const { config } = deps;
    this.app = express();
    this.host = options.host ?? config.get('Website', 'HostingIP', HTTP.DEFAULT_HOST);
    this.port = options.port ?? config.get('Website', 'Port', HTTP.DEFAULT_PORT);
    this.accessKey = new AccessKeyGuard(() => config.get('Website', 'AccessKey'));
    this.housekeeping = deps.housekeeping ?? new Housekeeping({
      config,
      logger: deps.logger,
      coordinator: deps.coordinator,
    });
    this.routeHandlers = new APIRouteHandlers({ ...deps, housekeeping: this.housekeeping });
    this.setupMiddleware();
    this.registerRoutes();
    this.setupErrorHandling();
  }

  private setupMiddleware(): void {
    this.app.disable('x-powered-by');

    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      this.deps.logger.log(`${req.method} ${req.path}`, 'debug');
      next();
    });

    // Access key first to minimize processing on forbidden requests
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      if (req.path === '/api/v1/health' || this.accessKey.validateRequest(req)) {
        return next();
      }
      this.deps.logger.log(`Forbidden request for ${req.path} from ${req.ip ?? 'unknown'}`, 'warning');
      return res.status(403).json(toApiError('FORBIDDEN', 'Access forbidden.'));
    });

    this.app.use(express.json({ limit: this.options.maxBodyBytes ?? HTTP.MAX_BODY_BYTES, type: 'application/json' }));

    // Every read sees current config and a fresh cache
    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      if (req.method !== 'GET' || req.path === '/api/v1/health') return next();
      this.housekeeping.run().then(() => next(), next);
    });
  }

  private route(handler: AsyncRoute) {
    return (req: Request, res: Response, next: NextFunction) => {
      handler(req, res).catch(next);
    };
  }

  private registerRoutes(): void {
    const h = this.routeHandlers;

    // Health & Status
    this.app.get('/api/v1/health', this.route((req, res) => h.handleHealth(req, res)));
    this.app.get('/api/v1/status', this.route((req, res) => h.handleStatus(req, res)));

    // Devices
    this.app.get('/api/v1/devices', this.route((req, res) => h.handleListDevices(req, res)));
    this.app.get('/api/v1/device', this.route((req, res) => h.handleGetDevice(req, res)));
    this.app.get('/api/v1/devices/:index/value', this.route((req, res) => h.handleGetDeviceValue(req, res)));

    // Ingestion
    this.app.post('/api/submit', this.route((req, res) => h.handleSubmit(req, res)));

    // Generated charts
    const artifactDir = this.options.artifactDir ?? this.deps.config.getArtifactDirectory();
    this.app.use('/charts', express.static(artifactDir, { index: false, dotfiles: 'ignore', fallthrough: true }));
  }

  private setupErrorHandling(): void {
    this.app.use((_req: Request, res: Response) => {
      res.status(404).json(toApiError('NOT_FOUND', 'Not found'));
    });

    this.app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      const bodyError = describeRequestBodyError(err);
      if (bodyError) {
        this.deps.logger.log(`Rejected body for ${req.method} ${req.path}: ${bodyError.detail}`, 'warning');
        return res.status(bodyError.status).json(toApiError('VALIDATION_ERROR', bodyError.message));
      }
      if (err instanceof StateStoreError && err.code === 'STORE_UNAVAILABLE') {
        this.deps.logger.log(err.message, 'error');
        return res.status(503).json(toApiError('STORE_UNAVAILABLE', err.message));
      }
      this.deps.logger.reportFatalError('Unhandled error while serving request', err);
      return res.status(500).json(toApiError('INTERNAL_ERROR', 'Internal server error'));
    });
  }

  // Server lifecycle methods
  async start(): Promise<void> {
    if (this.server) return;
    await new Promise<void>((resolve, reject) => {
      const srv = this.app.listen(this.port, this.host, () => {
        srv.off('error', reject);
        this.server = srv;
        resolve();
      });
      srv.once('error', reject);
    });
    this.deps.logger.log(`Dashboard API listening on http://${this.host}:${this.getPort()}`, 'summary');
  }

  async close(): Promise<void> {
    const srv = this.server;
    if (!srv) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      srv.close((error) => (error ? reject(error) : resolve()));
    });
  }

  getPort(): number {
    if (this.server) {
      const addr: AddressInfo | string | null = this.server.address();
      if (addr && typeof addr === 'object') {
        return addr.port;
      }
    }
    return this.port;
  }
}
