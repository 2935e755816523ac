/**
 * Energy Dashboard HTTP API Server
 *
 * Read-only JSON API over the current dataset snapshot, plus a reload hook.
 *
 * Features:
 * - Zod query validation
 * - Standardized APIResponse wrapper
 * - API versioning (/v1/...)
 * - Request ID tracking
 *
 * Every handler takes the context's snapshot once, at the start of the
 * request, so a reload running in parallel never mixes two datasets in one
 * response.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import { yearRangeFrom, type FilterSpec } from '../analytics/filter-spec.js';
import { ENERGY_TYPES } from '../core/constants.js';
import { isPipelineError, errorMessage } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import type { DatasetSnapshot } from '../context/pipeline.js';
import type { EnergyPipelineContext } from '../context/pipeline-context.js';
import { buildChoropleth } from '../geo/choropleth.js';

const log = createLogger({ module: 'api' });

/**
 * Standardized API response wrapper
 */
export interface APIResponse<T> {
  readonly success: boolean;
  readonly data?: T;
  readonly error?: {
    readonly code: string;
    readonly message: string;
    readonly details?: unknown;
  };
  readonly meta: {
    readonly requestId: string;
    readonly latencyMs: number;
    readonly cached: boolean;
    readonly version: string;
    /** Snapshot version the response was computed from */
    readonly datasetVersion?: number;
  };
}

export interface APIServerOptions {
  readonly port?: number;
  readonly host?: string;
  readonly corsOrigins?: readonly string[];
}

export type ErrorCode =
  | 'INVALID_PARAMETERS'
  | 'NOT_FOUND'
  | 'METHOD_NOT_ALLOWED'
  | 'UNSUPPORTED_VERSION'
  | 'RELOAD_FAILED'
  | 'INTERNAL_ERROR';

const API_VERSION = 'v1';

// ============================================================================
// Request Validation Schemas (Zod)
// ============================================================================

const listParam = z
  .array(z.string())
  .transform((values) =>
    values
      .flatMap((value) => value.split(','))
      .map((value) => value.trim())
      .filter((value) => value.length > 0)
  );

const filterQuerySchema = z.object({
  from: z.coerce.number().int('from must be an integer year').optional(),
  to: z.coerce.number().int('to must be an integer year').optional(),
  region: listParam,
  type: listParam,
});

const dimensionSchema = z.enum(['year', 'region', 'energyType']);

const totalsQuerySchema = z.object({
  by: dimensionSchema.default('region'),
});

const pivotQuerySchema = z.object({
  rows: dimensionSchema.default('region'),
  cols: dimensionSchema.default('year'),
});

const summaryQuerySchema = z.object({
  top: z.coerce.number().int().min(1).max(100).default(5),
});

const growthTypeSchema = z.array(z.enum(ENERGY_TYPES)).length(1, 'growth needs exactly one type');

type FilterQuery = z.infer<typeof filterQuerySchema>;

class RequestError extends Error {
  constructor(
    message: string,
    readonly details?: unknown
  ) {
    super(message);
  }
}

function parseQuery<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new RequestError('Invalid request parameters', result.error.flatten());
  }
  return result.data;
}

function readFilterQuery(url: URL): FilterQuery {
  return parseQuery(filterQuerySchema, {
    from: url.searchParams.get('from') ?? undefined,
    to: url.searchParams.get('to') ?? undefined,
    region: url.searchParams.getAll('region'),
    type: url.searchParams.getAll('type'),
  });
}

function toFilterSpec(query: FilterQuery, snapshot: DatasetSnapshot): FilterSpec {
  return {
    yearRange: yearRangeFrom(query.from, query.to, snapshot.yearRange),
    regions: query.region,
    energyTypes: query.type,
  };
}

/**
 * HTTP API server over an EnergyPipelineContext
 */
export class EnergyDashboardAPI {
  private readonly server: Server;
  private readonly port: number;
  private readonly host: string;
  private readonly corsOrigins: readonly string[];

  constructor(
    private readonly context: EnergyPipelineContext,
    options: APIServerOptions = {}
  ) {
    this.port = options.port ?? 8080;
    this.host = options.host ?? '127.0.0.1';
    this.corsOrigins = options.corsOrigins ?? ['*'];

    this.server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        log.error('Unhandled request failure', { error: errorMessage(error) });
        if (!res.headersSent) {
          res.writeHead(500);
        }
        res.end();
      });
    });
  }

  /**
   * Start HTTP server; resolves with the bound address (port 0 picks a free one)
   */
  start(): Promise<{ host: string; port: number }> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.port, this.host, () => {
        this.server.off('error', reject);
        const address = this.address();
        log.info('Energy dashboard API server started', {
          version: API_VERSION,
          url: `http://${address.host}:${address.port}`,
        });
        log.info('API endpoints registered', {
          endpoints: [
            'GET /health',
            `GET /${API_VERSION}/meta`,
            `GET /${API_VERSION}/observations?from&to&region&type`,
            `GET /${API_VERSION}/totals?by=region|energyType|year`,
            `GET /${API_VERSION}/growth?type={type}&region={code}`,
            `GET /${API_VERSION}/pivot?rows={dim}&cols={dim}`,
            `GET /${API_VERSION}/summary?top={n}`,
            `GET /${API_VERSION}/geo`,
            `POST /${API_VERSION}/reload`,
          ],
        });
        resolve(address);
      });
    });
  }

  /**
   * Stop HTTP server
   */
  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        log.info('API server stopped');
        resolve();
      });
      this.server.closeAllConnections();
    });
  }

  address(): { host: string; port: number } {
    const address: AddressInfo | string | null = this.server.address();
    if (address === null || typeof address === 'string') {
      return { host: this.host, port: this.port };
    }
    return { host: address.address, port: address.port };
  }

  /**
   * Handle incoming HTTP request
   */
  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const requestId = this.generateRequestId();
    const startTime = performance.now();

    this.setHeaders(res, requestId);

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const pathname = url.pathname;
    const elapsed = (): number => performance.now() - startTime;

    if (pathname === '/health') {
      if (req.method !== 'GET') {
        this.sendErrorResponse(res, 405, 'METHOD_NOT_ALLOWED', `${req.method ?? ''} not allowed`, requestId, elapsed());
        return;
      }
      const snapshot = this.context.snapshot;
      this.sendSuccessResponse(res, this.health(snapshot), requestId, elapsed(), snapshot.version);
      return;
    }

    const versionMatch = /^\/(v\d+)(\/.*)$/.exec(pathname);
    if (versionMatch === null) {
      this.sendErrorResponse(res, 404, 'NOT_FOUND', `Endpoint not found: ${pathname}`, requestId, elapsed());
      return;
    }
    const [, requestedVersion = '', basePath = ''] = versionMatch;
    if (requestedVersion !== API_VERSION) {
      this.sendErrorResponse(
        res,
        400,
        'UNSUPPORTED_VERSION',
        `API version ${requestedVersion} not supported. Current version: ${API_VERSION}`,
        requestId,
        elapsed()
      );
      return;
    }

    try {
      if (basePath === '/reload') {
        if (req.method !== 'POST') {
          this.sendErrorResponse(res, 405, 'METHOD_NOT_ALLOWED', 'Use POST for reload', requestId, elapsed());
          return;
        }
        await this.handleReload(res, requestId, startTime);
        return;
      }

      if (req.method !== 'GET') {
        this.sendErrorResponse(res, 405, 'METHOD_NOT_ALLOWED', `${req.method ?? ''} not allowed`, requestId, elapsed());
        return;
      }

      // One snapshot per request
      const snapshot = this.context.snapshot;
      const data = this.route(basePath, url, snapshot);
      if (data === undefined) {
        this.sendErrorResponse(res, 404, 'NOT_FOUND', `Endpoint not found: ${pathname}`, requestId, elapsed());
        return;
      }
      this.sendSuccessResponse(res, data.body, requestId, elapsed(), snapshot.version, data.cached);
    } catch (error) {
      if (error instanceof RequestError) {
        this.sendErrorResponse(res, 400, 'INVALID_PARAMETERS', error.message, requestId, elapsed(), error.details);
        return;
      }
      if (isPipelineError(error) && error.stage === 'filter') {
        this.sendErrorResponse(res, 400, 'INVALID_PARAMETERS', error.message, requestId, elapsed(), {
          field: error.column,
        });
        return;
      }

      log.error('API request error', {
        requestId,
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      this.sendErrorResponse(res, 500, 'INTERNAL_ERROR', 'Internal server error', requestId, elapsed());
    }
  }

  /**
   * Dispatch a GET endpoint; undefined for an unknown path
   */
  private route(
    basePath: string,
    url: URL,
    snapshot: DatasetSnapshot
  ): { body: unknown; cached: boolean } | undefined {
    const params = Object.fromEntries(url.searchParams.entries());

    if (basePath === '/meta') {
      return { body: this.meta(snapshot), cached: false };
    }

    const knownPaths = ['/observations', '/totals', '/growth', '/pivot', '/summary', '/geo'];
    if (!knownPaths.includes(basePath)) {
      return undefined;
    }

    const query = readFilterQuery(url);
    const before = snapshot.aggregator.stats().hits;

    // growth filters on everything but type; the single type selects the series.
    // The map shows one year, the latest unless a bound is given.
    const effective =
      basePath === '/growth'
        ? { ...query, type: [] }
        : basePath === '/geo' && query.from === undefined && query.to === undefined
          ? { ...query, from: snapshot.yearRange.max }
          : query;
    const view = snapshot.aggregator.filter(toFilterSpec(effective, snapshot));
    const cached = snapshot.aggregator.stats().hits > before;

    switch (basePath) {
      case '/observations':
        return { body: { count: view.size, rows: view.rows }, cached };

      case '/totals': {
        const { by } = parseQuery(totalsQuerySchema, params);
        const totals: ReadonlyMap<string | number, number> =
          by === 'region' ? view.totalByRegion() : by === 'energyType' ? view.totalByEnergyType() : view.totalByYear();
        return {
          body: { by, totals: [...totals].map(([key, totalMwh]) => ({ key: String(key), totalMwh })) },
          cached,
        };
      }

      case '/growth': {
        const [energyType] = parseQuery(growthTypeSchema, query.type);
        if (energyType === undefined) {
          throw new RequestError('growth needs exactly one type');
        }
        const regionCode = query.region.length === 1 ? query.region[0] : undefined;
        return {
          body: {
            energyType,
            regionCode: regionCode ?? null,
            points: view.yoyGrowth(energyType, regionCode).map((point) => ({
              ...point,
              growth: point.growth ?? null,
            })),
          },
          cached,
        };
      }

      case '/pivot': {
        const { rows, cols } = parseQuery(pivotQuerySchema, params);
        return { body: view.pivot(rows, cols).toJSON(), cached };
      }

      case '/summary': {
        const { top } = parseQuery(summaryQuerySchema, params);
        const summary = view.summary();
        return {
          body: {
            ...summary,
            firstYear: summary.firstYear ?? null,
            lastYear: summary.lastYear ?? null,
            growthRate: summary.growthRate ?? null,
            energyShares: view.energyShares().map((share) => ({ ...share, share: share.share ?? null })),
            productionChange: view.productionChange() ?? null,
            topRegions: view.topRegions(top),
          },
          cached,
        };
      }

      case '/geo':
        return { body: buildChoropleth(snapshot.geo, view.totalByRegion()), cached };

      default:
        return undefined;
    }
  }

  private health(snapshot: DatasetSnapshot): unknown {
    return {
      status: 'ok',
      datasetVersion: snapshot.version,
      loadedAt: snapshot.loadedAt,
      observations: snapshot.observations.length,
      geoFailures: snapshot.geo.failedRegionCodes.length,
    };
  }

  private meta(snapshot: DatasetSnapshot): Record<string, unknown> {
    return {
      datasetVersion: snapshot.version,
      sourcePath: snapshot.sourcePath,
      loadedAt: snapshot.loadedAt,
      regions: snapshot.regions,
      yearRange: snapshot.yearRange,
      energyTypes: snapshot.energyTypes,
      skippedEnergyTypes: snapshot.skippedEnergyTypes,
      ignoredColumns: snapshot.ignoredColumns,
      cleaning: {
        zeroFilledCells: snapshot.cleaning.zeroFilled.length,
        forwardFilled: snapshot.cleaning.forwardFilled,
      },
      geoFailures: snapshot.geo.failedRegionCodes,
    };
  }

  /**
   * Handle POST /v1/reload; a failed reload leaves the served snapshot as is
   */
  private async handleReload(res: ServerResponse, requestId: string, startTime: number): Promise<void> {
    const previous = this.context.snapshot.version;
    try {
      const snapshot = await this.context.reload();
      this.sendSuccessResponse(
        res,
        { previousVersion: previous, ...this.meta(snapshot) },
        requestId,
        performance.now() - startTime,
        snapshot.version
      );
    } catch (error) {
      log.warn('Reload failed, keeping current snapshot', {
        requestId,
        error: isPipelineError(error) ? error.toLogString() : errorMessage(error),
      });
      this.sendErrorResponse(
        res,
        500,
        'RELOAD_FAILED',
        errorMessage(error),
        requestId,
        performance.now() - startTime,
        isPipelineError(error)
          ? { stage: error.stage, row: error.row, column: error.column, datasetVersion: previous }
          : { datasetVersion: previous }
      );
    }
  }

  private setHeaders(res: ServerResponse, requestId: string): void {
    res.setHeader('X-Request-ID', requestId);
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('Access-Control-Allow-Origin', this.corsOrigins.join(', '));
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
  }

  /**
   * Send success response (standardized)
   */
  private sendSuccessResponse<T>(
    res: ServerResponse,
    data: T,
    requestId: string,
    latencyMs: number,
    datasetVersion: number,
    cached = false
  ): void {
    const response: APIResponse<T> = {
      success: true,
      data,
      meta: {
        requestId,
        latencyMs: Math.round(latencyMs * 100) / 100,
        cached,
        version: API_VERSION,
        datasetVersion,
      },
    };

    res.setHeader('X-Cache', cached ? 'HIT' : 'MISS');
    res.setHeader('Cache-Control', 'no-cache');
    res.writeHead(200, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(response));
  }

  /**
   * Send error response (standardized)
   */
  private sendErrorResponse(
    res: ServerResponse,
    status: number,
    code: ErrorCode,
    message: string,
    requestId: string,
    latencyMs: number,
    details?: unknown
  ): void {
    const response: APIResponse<never> = {
      success: false,
      error: {
        code,
        message,
        details,
      },
      meta: {
        requestId,
        latencyMs: Math.round(latencyMs * 100) / 100,
        cached: false,
        version: API_VERSION,
      },
    };

    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(response));
  }

  /**
   * Generate unique request ID
   */
  private generateRequestId(): string {
    return `req_${randomBytes(8).toString('hex')}`;
  }
}
