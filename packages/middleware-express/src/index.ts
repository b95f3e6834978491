/**
 * @reqsafe/middleware-express
 *
 * Express bindings for the token service and the idempotency guard.
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { bearerAuth, idempotency, problemHandler } from '@reqsafe/middleware-express';
 *
 * const app = express();
 * app.use(express.json());
 *
 * app.post('/charges', bearerAuth({ tokens }), idempotency({ guard }), (req, res) => {
 *   res.status(201).json(charges.create(req.body));
 * });
 *
 * app.use(problemHandler());
 * ```
 *
 * @packageDocumentation
 */

export { bearerAuth, getClaims } from './auth.js';
export type { BearerAuthOptions } from './auth.js';

export { idempotency, defaultScope, UnsuccessfulResponseError } from './idempotency.js';
export type { IdempotencyMiddlewareOptions, RecordedResponse } from './idempotency.js';

export { problemHandler, toProblem, PROBLEM_CONTENT_TYPE } from './problem.js';
export type { ProblemDetails, ProblemHandlerOptions } from './problem.js';
