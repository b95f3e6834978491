/**
 * Idempotency-Key handling for state-changing routes
 *
 * The first request with a key runs the downstream handlers; its status
 * and JSON body are recorded. Duplicates get the recorded response replayed
 * with `Idempotent-Replayed: true`, or the guard's error.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { HEADERS, createLogger, type Logger } from '@reqsafe/kernel';
import type { IdempotencyGuard } from '@reqsafe/idempotency';
import { getClaims } from './auth.js';

export interface IdempotencyMiddlewareOptions {
  guard: IdempotencyGuard;
  /** Request header carrying the key (default: Idempotency-Key) */
  header?: string;
  /** Key namespace; defaults to `<METHOD> <path>`, suffixed with the token subject */
  scope?: string | ((req: Request, res: Response) => string);
  /** Record TTL for these routes, in ms */
  ttlMs?: number;
  logger?: Logger;
}

/**
 * Response as recorded for replay
 */
export interface RecordedResponse {
  status: number;
  body: unknown;
}

/**
 * Raised inside the guarded operation for 4xx/5xx responses, so the key
 * is recorded as failed and can be retried once that record expires.
 */
export class UnsuccessfulResponseError extends Error {
  readonly response: RecordedResponse;

  constructor(response: RecordedResponse) {
    super(`Handler responded with status ${response.status}`);
    this.name = 'UnsuccessfulResponseError';
    this.response = response;
  }
}

const GUARDED_METHODS = new Set(['POST', 'PUT', 'PATCH', 'DELETE']);

export function defaultScope(req: Request, res: Response): string {
  const scope = `${req.method} ${req.baseUrl}${req.path}`;
  const subject = getClaims(res)?.sub;
  return subject ? `${scope}:${subject}` : scope;
}

/**
 * Run the rest of the chain and resolve with the response it ends
 *
 * Settles when the handler ends the response, whether or not the client is
 * still connected. A client that goes away mid-handler leaves the outcome
 * pending until the handler finishes. Bodies sent through `res.json` are
 * kept; any other body is recorded as absent.
 */
function captureResponse(res: Response, next: NextFunction): Promise<RecordedResponse> {
  return new Promise<RecordedResponse>((resolve, reject) => {
    let body: unknown;

    const originalJson = res.json.bind(res);
    res.json = function recordingJson(payload?: unknown): Response {
      res.json = originalJson;
      body = payload;
      return originalJson(payload);
    };

    res.end = new Proxy(res.end, {
      apply(end, thisArg, args) {
        const recorded: RecordedResponse = { status: res.statusCode, body };
        if (recorded.status >= 400) {
          reject(new UnsuccessfulResponseError(recorded));
        } else {
          resolve(recorded);
        }
        return Reflect.apply(end, thisArg, args);
      },
    });

    next();
  });
}

function replay(res: Response, recorded: RecordedResponse): void {
  res.status(recorded.status);
  if (recorded.body === undefined) {
    res.end();
  } else {
    res.json(recorded.body);
  }
}

export function idempotency(options: IdempotencyMiddlewareOptions): RequestHandler {
  const header = options.header ?? HEADERS.idempotencyKey;
  const logger = options.logger ?? createLogger('reqsafe-http');

  return function idempotencyMiddleware(req: Request, res: Response, next: NextFunction): void {
    if (!GUARDED_METHODS.has(req.method)) {
      next();
      return;
    }

    const key = req.get(header);
    const scope =
      typeof options.scope === 'function'
        ? options.scope(req, res)
        : (options.scope ?? defaultScope(req, res));
    if (key) {
      res.setHeader(header, key);
    }

    const controller = new AbortController();
    res.on('close', () => controller.abort());

    let executed = false;
    options.guard
      .run(
        scope,
        key,
        options.ttlMs,
        () => {
          executed = true;
          return captureResponse(res, next);
        },
        { signal: controller.signal }
      )
      .then((recorded) => {
        if (executed) return;
        logger.debug({ scope, key, status: recorded.status }, 'Replaying recorded response');
        res.setHeader(HEADERS.idempotentReplayed, 'true');
        replay(res, recorded);
      })
      .catch((error: unknown) => {
        if (executed) {
          // The owner's own response has already gone out
          if (!(error instanceof UnsuccessfulResponseError)) {
            logger.warn({ err: error, scope, key }, 'Idempotent response was sent but not recorded');
          }
          return;
        }
        if (controller.signal.aborted) {
          logger.debug({ scope, key }, 'Client went away while waiting for idempotency owner');
          return;
        }
        next(error);
      });
  };
}
