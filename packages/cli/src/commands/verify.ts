/**
 * reqsafe token verify <token> [--ignore-expiration]
 */

import type { TokenService } from '@reqsafe/tokens';
import type { CommandResult, VerifyOutput } from '../types.js';
import { handleError, timing } from '../utils.js';

export interface VerifyOptions {
  ignoreExpiration?: boolean;
}

export class VerifyCommand {
  constructor(private readonly tokens: () => TokenService) {}

  async execute(token: string, options: VerifyOptions = {}): Promise<CommandResult<VerifyOutput>> {
    const timer = timing();

    try {
      const claims = await this.tokens().decode(token, { verifyExpiration: !options.ignoreExpiration });

      return {
        success: true,
        data: { kind: 'verify', valid: true, claims },
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
