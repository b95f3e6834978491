/**
 * reqsafe token issue --claims <json> [--expires-in <minutes>]
 */

import { parseCompactToken, type TokenService } from '@reqsafe/tokens';
import type { CommandResult, IssueOutput } from '../types.js';
import { handleError, timing } from '../utils.js';

export interface IssueOptions {
  /** Lifetime in minutes; the configured default applies when unset */
  expiresIn?: number;
}

function parseClaimsArgument(text: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new Error('Claims are not valid JSON');
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Claims must be a JSON object');
  }
  return { ...parsed };
}

export class IssueCommand {
  constructor(private readonly tokens: () => TokenService) {}

  async execute(claimsJson: string, options: IssueOptions = {}): Promise<CommandResult<IssueOutput>> {
    const timer = timing();

    try {
      const claims = parseClaimsArgument(claimsJson);
      const token = await this.tokens().encode(claims, options.expiresIn);
      const issued = parseCompactToken(token).claims;

      return {
        success: true,
        data: { kind: 'issue', token, issuedAt: issued.iat, expiresAt: issued.exp },
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
