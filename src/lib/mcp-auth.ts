/**
 * Shared-token authentication for MCP requests
 *
 * Enabled by RECALL_AUTH_TOKEN. Clients send the token as
 * `params._meta.authToken` on every tools/* and prompts/* request.
 */

import { timingSafeEqual } from 'crypto';

/** JSON-RPC error code reported for rejected requests */
export const AUTH_ERROR_CODE = -32001;

export interface AuthRequest {
  params?: {
    _meta?: {
      authToken?: unknown;
      [key: string]: unknown;
    };
  };
}

export class AuthenticationError extends Error {
  readonly code = AUTH_ERROR_CODE;

  constructor(message: string) {
    super(message);
    this.name = 'AuthenticationError';
  }
}

/**
 * Read the client token from request metadata
 */
export function extractToken(request: AuthRequest): string | null {
  const token = request.params?._meta?.authToken;
  return typeof token === 'string' && token.length > 0 ? token : null;
}

function tokensMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * @param requiredToken - null disables the check
 * @throws {AuthenticationError} When the token is missing or does not match
 */
export function checkAuth(request: AuthRequest, requiredToken: string | null): void {
  if (!requiredToken) return;

  const token = extractToken(request);
  if (token === null) {
    throw new AuthenticationError('Authentication required: Missing token in request metadata');
  }
  if (!tokensMatch(token, requiredToken)) {
    throw new AuthenticationError('Authentication failed: Invalid token');
  }
}

export function isAuthEnabled(requiredToken: string | null): boolean {
  return !!requiredToken;
}
