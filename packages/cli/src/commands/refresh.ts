/**
 * reqsafe token refresh <token> [--expires-in <minutes>] [--allow-expired]
 */

import { parseCompactToken, type TokenService } from '@reqsafe/tokens';
import type { CommandResult, RefreshOutput } from '../types.js';
import { handleError, timing } from '../utils.js';

export interface RefreshOptions {
  expiresIn?: number;
  allowExpired?: boolean;
}

export class RefreshCommand {
  constructor(private readonly tokens: () => TokenService) {}

  async execute(token: string, options: RefreshOptions = {}): Promise<CommandResult<RefreshOutput>> {
    const timer = timing();

    try {
      const refreshed = await this.tokens().refresh(token, options.expiresIn, {
        allowExpired: options.allowExpired,
      });

      return {
        success: true,
        data: { kind: 'refresh', token: refreshed, expiresAt: parseCompactToken(refreshed).claims.exp },
        timing: timer.end(),
      };
    } catch (error) {
      return {
        ...handleError(error),
        timing: timer.end(),
      };
    }
  }
}
