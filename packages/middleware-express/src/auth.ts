/**
 * Bearer token authentication
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { MalformedTokenError } from '@reqsafe/kernel';
import type { Claims, TokenService } from '@reqsafe/tokens';

export interface BearerAuthOptions {
  tokens: TokenService;
  /** Let requests without an Authorization header through unauthenticated */
  optional?: boolean;
}

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

const claimsByResponse = new WeakMap<Response, Claims>();

/**
 * Claims of the token `bearerAuth` accepted for this response, if any
 */
export function getClaims(res: Response): Claims | undefined {
  return claimsByResponse.get(res);
}

/**
 * Validate `Authorization: Bearer <token>` and expose its claims
 *
 * Accepted claims are available from `getClaims(res)` and `res.locals.claims`.
 * Token failures are passed to `next` as the typed decode error.
 */
export function bearerAuth(options: BearerAuthOptions): RequestHandler {
  return function bearerAuthMiddleware(req: Request, res: Response, next: NextFunction): void {
    const header = req.get('authorization');
    if (!header) {
      if (options.optional) {
        next();
      } else {
        next(new MalformedTokenError('Missing bearer token'));
      }
      return;
    }

    const match = BEARER_PATTERN.exec(header.trim());
    const token = match?.[1];
    if (!token) {
      next(new MalformedTokenError('Authorization header is not a bearer token'));
      return;
    }

    options.tokens.validate(token).then((result) => {
      if (!result.ok) {
        next(result.error);
        return;
      }
      claimsByResponse.set(res, result.value);
      res.locals['claims'] = result.value;
      next();
    }, next);
  };
}
