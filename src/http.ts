import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import compression from 'compression';
import cors from 'cors';
import { InvalidQueryError } from './errors.js';
import { type Logger, silentLogger, describeError } from './logger.js';
import type { ScheduleService } from './schedule-service.js';

type Handler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error middleware
function asyncHandler(handler: Handler): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function requireJson(req: Request): void {
  if (req.method === 'POST' && !req.is('application/json')) {
    throw new InvalidQueryError('Request must be JSON');
  }
}

/** GET and POST carry the same parameters: in the query string or in a JSON body */
function paramsOf(req: Request): unknown {
  requireJson(req);
  return req.method === 'POST' ? req.body : req.query;
}

function hasEmptyBody(req: Request): boolean {
  const length = req.headers['content-length'];
  return req.headers['transfer-encoding'] === undefined && (length === undefined || length === '0');
}

/** Gzip successful responses of any size for clients that accept it */
const compressSuccess: typeof compression.filter = (req, res) =>
  res.statusCode >= 200 && res.statusCode < 300 && compression.filter(req, res);

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'status' in error && error.status === 400;
}

/**
 * Lesson queries take their filters as a JSON-encoded `filters` query parameter on GET.
 */
function lessonParamsOf(req: Request): unknown {
  const params = paramsOf(req);
  if (req.method !== 'GET') return params;

  const { filters, ...rest } = req.query;
  if (filters === undefined) return rest;
  if (typeof filters !== 'string') {
    throw new InvalidQueryError('filters must be a JSON object', 'filters');
  }
  try {
    return { ...rest, filters: JSON.parse(filters) };
  } catch {
    throw new InvalidQueryError('filters must be a JSON object', 'filters');
  }
}

/**
 * The HTTP surface over a ScheduleService.
 */
export function createApp(service: ScheduleService, logger: Logger = silentLogger): express.Express {
  const app = express();
  app.use(cors());
  app.use(compression({ threshold: 0, filter: compressSuccess }));
  app.use(express.json());

  function getAndPost(path: string, handler: RequestHandler): void {
    app.route(path).get(handler).post(handler);
  }

  getAndPost(
    '/api/getFilterOptions',
    asyncHandler(async (req, res) => {
      res.json(await service.getFilterOptions(paramsOf(req)));
    })
  );

  getAndPost(
    '/api/getRUZ',
    asyncHandler(async (req, res) => {
      res.json(await service.getLessons(lessonParamsOf(req)));
    })
  );

  getAndPost(
    '/api/search',
    asyncHandler(async (req, res) => {
      res.json(await service.search(paramsOf(req)));
    })
  );

  app.post(
    '/api/clearCache',
    asyncHandler(async (req, res) => {
      // No body at all clears everything; any body must be JSON
      res.json(await service.clearCache(hasEmptyBody(req) ? {} : paramsOf(req)));
    })
  );

  app.get('/api/cacheStats', (_req, res) => {
    res.json(service.cacheStats());
  });

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (error instanceof InvalidQueryError) {
      res.status(400).json({ error: error.message });
      return;
    }
    if (isBodyParseError(error)) {
      res.status(400).json({ error: 'Request must be JSON' });
      return;
    }
    logger.error(`Request processing error: ${describeError(error)}`);
    res.status(500).json({ error: `Request processing error: ${describeError(error)}` });
  });

  return app;
}
