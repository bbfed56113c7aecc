import axios from 'axios';
import type { PlatformAuthConfig } from '../../config/env';
import { errorMessage } from '../../utils/errors';
import type { Logger } from '../../utils/logger';
import { PlatformError } from './errors';
import type { HttpPoster } from './http';

export type TokenProvider = () => Promise<string>;

const EXPIRY_MARGIN_MS = 60_000;

interface TokenProviderOptions {
  http?: HttpPoster;
  logger?: Logger;
  now?: () => number;
}

interface CachedToken {
  value: string;
  expiresAt: number;
}

function parseTokenResponse(data: unknown): { accessToken: string; expiresIn?: number } {
  if (typeof data !== 'object' || data === null) {
    throw new Error('token endpoint returned no JSON body');
  }
  const accessToken: unknown = Reflect.get(data, 'access_token');
  if (typeof accessToken !== 'string' || accessToken === '') {
    throw new Error("'access_token' missing from token response");
  }
  const expiresIn: unknown = Reflect.get(data, 'expires_in');
  return { accessToken, expiresIn: typeof expiresIn === 'number' ? expiresIn : undefined };
}

/**
 * Returns a function yielding a bearer token for the platform. A personal token
 * is handed out as is; otherwise a client-credentials exchange is performed and
 * its result reused until shortly before it expires.
 */
export function createTokenProvider(
  auth: PlatformAuthConfig,
  options: TokenProviderOptions = {}
): TokenProvider {
  const personalToken = auth.personalToken;
  if (personalToken) {
    return async () => personalToken;
  }

  const http = options.http ?? axios;
  const now = options.now ?? Date.now;
  let cached: CachedToken | null = null;

  return async () => {
    if (cached && now() < cached.expiresAt) {
      return cached.value;
    }

    try {
      if (!auth.authUrl) throw new Error('AUTH_URL is not configured');
      const form = new URLSearchParams({
        client_id: auth.clientId ?? '',
        client_secret: auth.clientSecret ?? '',
        audience: auth.audience ?? '',
        grant_type: auth.grantType
      });
      const res = await http.post(auth.authUrl, form, {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' }
      });
      const token = parseTokenResponse(res.data);
      cached =
        token.expiresIn !== undefined
          ? { value: token.accessToken, expiresAt: now() + token.expiresIn * 1000 - EXPIRY_MARGIN_MS }
          : null;
      options.logger?.debug({ expiresIn: token.expiresIn }, 'Retrieved platform access token');
      return token.accessToken;
    } catch (err) {
      throw new PlatformError(`Error while retrieving tokens: ${errorMessage(err)}`);
    }
  };
}
