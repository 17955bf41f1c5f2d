import express, { type Application, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import type { Logger } from 'winston';
import type { UsageLedger } from '../billing/ledger.js';
import { BillingQuerySchema, InitRequestSchema, QueryRequestSchema, SyncRequestSchema } from '../schemas/api.js';
import type { NotionRagService } from '../service.js';
import type { InitResult, SyncResult } from '../types/index.js';
import { InvalidInputError, NotFoundError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export interface ApiOptions {
  service: NotionRagService;
  ledger: UsageLedger;
  host?: string;
  port?: number;
  logger?: Logger;
}

type RouteHandler = (req: Request, res: Response) => Promise<void>;

export function statusForError(error: unknown): number {
  if (error instanceof InvalidInputError) return 400;
  if (error instanceof NotFoundError) return 404;
  return 500;
}

function runSummary(result: InitResult | SyncResult): Record<string, unknown> {
  const common = {
    label: result.label,
    db_id: result.databaseId,
    indexing_cost: result.indexingCost,
    image_cost: result.imageCost,
    total_cost: result.totalCost,
    failures: result.failures.map((failure) => ({ page_id: failure.pageId, error: failure.error })),
    cancelled: result.cancelled,
  };

  if ('pagesChecked' in result) {
    return {
      ...common,
      pages_checked: result.pagesChecked,
      pages_updated: result.pagesUpdated,
      pages_skipped: result.pagesSkipped,
      force: result.force,
    };
  }
  return {
    ...common,
    store_name: result.storeName,
    pages_total: result.pagesTotal,
    pages_indexed: result.pagesIndexed,
    pages_skipped: result.pagesSkipped,
  };
}

export class NotionRagApi {
  private readonly app: Application;
  private readonly service: NotionRagService;
  private readonly ledger: UsageLedger;
  private readonly host: string;
  private readonly port: number;
  private readonly logger: Logger;
  private server: Server | null = null;

  constructor(options: ApiOptions) {
    this.app = express();
    this.service = options.service;
    this.ledger = options.ledger;
    this.host = options.host ?? '127.0.0.1';
    this.port = options.port ?? 8000;
    this.logger = options.logger ?? createLogger({ name: 'api' });

    this.setupMiddleware();
    this.setupRoutes();
  }

  get application(): Application {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json());

    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const startTime = Date.now();
      res.on('finish', () => {
        const elapsedMs = Date.now() - startTime;
        this.logger.info(`${req.method} ${req.path} ${res.statusCode} ${elapsedMs}ms`);
        this.ledger
          .logApi({
            method: req.method,
            path: req.path,
            statusCode: res.statusCode,
            elapsedMs,
            ...(req.ip !== undefined ? { clientIp: req.ip } : {}),
          })
          .catch((error: unknown) => {
            this.logger.warn('Failed to write audit record', { error: errorMessage(error) });
          });
      });
      next();
    });
  }

  /** Wraps an async route so thrown errors become `{ error }` JSON with a mapped status. */
  private handle(route: RouteHandler): RouteHandler {
    return async (req, res) => {
      try {
        await route(req, res);
      } catch (error) {
        const status = statusForError(error);
        if (status >= 500) {
          this.logger.error(`${req.method} ${req.path} failed`, { error: errorMessage(error) });
        }
        res.status(status).json({ error: errorMessage(error) });
      }
    };
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok' });
    });

    this.app.get(
      '/stores',
      this.handle(async (_req, res) => {
        const stores = await this.service.listStores();
        res.json({
          stores: stores.map((store) => ({
            name: store.name,
            display_name: store.displayName,
            documents: store.documents,
            size_bytes: store.sizeBytes,
          })),
        });
      })
    );

    this.app.get(
      '/billing',
      this.handle(async (req, res) => {
        const parsed = BillingQuerySchema.safeParse(req.query);
        if (!parsed.success) {
          throw new InvalidInputError("period must be 'total', 'daily', or 'monthly'");
        }
        res.json(await this.service.billing(parsed.data.period));
      })
    );

    this.app.post(
      '/query',
      this.handle(async (req, res) => {
        const body = QueryRequestSchema.safeParse(req.body);
        if (!body.success) {
          throw new InvalidInputError(body.error.issues.map((issue) => issue.message).join('; '));
        }

        const result = await this.service.query(body.data.name, body.data.query, {
          model: body.data.model,
          source: 'api',
        });
        res.json({
          answer: result.answer,
          grounding: result.grounding === null ? null : { metadata: result.grounding },
          usage: {
            model: result.usage.model,
            input_tokens: result.usage.inputTokens,
            output_tokens: result.usage.outputTokens,
            cost: result.usage.cost,
          },
        });
      })
    );

    this.app.post(
      '/sync',
      this.handle(async (req, res) => {
        const body = SyncRequestSchema.safeParse(req.body ?? {});
        if (!body.success) {
          throw new InvalidInputError(body.error.issues.map((issue) => issue.message).join('; '));
        }
        res.json(runSummary(await this.service.sync(body.data.name, body.data.force)));
      })
    );

    this.app.post(
      '/init',
      this.handle(async (req, res) => {
        const body = InitRequestSchema.safeParse(req.body ?? {});
        if (!body.success) {
          throw new InvalidInputError(body.error.issues.map((issue) => issue.message).join('; '));
        }
        res.json(runSummary(await this.service.init(body.data.name, body.data.db_url)));
      })
    );
  }

  /** Resolves with the bound port, which differs from the configured one when that is 0. */
  async start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, this.host, () => {
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.port;
        this.logger.info(`Notion RAG API running on http://${this.host}:${port}`);
        resolve(port);
      });
      server.once('error', reject);
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
