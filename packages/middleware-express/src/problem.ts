/**
 * RFC 7807 problem responses
 */

import type { ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import { isSafetyError, createLogger, type Logger } from '@reqsafe/kernel';

export const PROBLEM_CONTENT_TYPE = 'application/problem+json';

export interface ProblemDetails {
  type: string;
  title: string;
  status: number;
  detail: string;
  instance?: string;
  code: string;
}

const INTERNAL_CODE = 'E_INTERNAL';

function titleFor(code: string): string {
  const words = code.replace(/^E_/, '').toLowerCase().replace(/_/g, ' ');
  return words.charAt(0).toUpperCase() + words.slice(1);
}

/**
 * Map a thrown value to problem details. Unknown errors expose nothing.
 */
export function toProblem(error: unknown, instance?: string): ProblemDetails {
  const code = isSafetyError(error) ? error.code : INTERNAL_CODE;
  return {
    type: `urn:reqsafe:error:${code.replace(/^E_/, '').toLowerCase()}`,
    title: isSafetyError(error) ? titleFor(code) : 'Internal server error',
    status: isSafetyError(error) ? error.httpStatus : 500,
    detail: isSafetyError(error) ? error.message : 'An unexpected error occurred',
    instance,
    code,
  };
}

export interface ProblemHandlerOptions {
  logger?: Logger;
}

/**
 * Express error handler answering with `application/problem+json`
 */
export function problemHandler(options: ProblemHandlerOptions = {}): ErrorRequestHandler {
  const logger = options.logger ?? createLogger('reqsafe-http');

  return function problemErrorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
    if (res.headersSent) {
      next(error);
      return;
    }

    const problem = toProblem(error, req.originalUrl);
    if (problem.status >= 500) {
      logger.error({ err: error, method: req.method, path: req.originalUrl }, 'Request failed');
    } else {
      logger.debug({ code: problem.code, method: req.method, path: req.originalUrl }, problem.detail);
    }

    res.status(problem.status).type(PROBLEM_CONTENT_TYPE).json(problem);
  };
}
