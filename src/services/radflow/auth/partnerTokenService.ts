/**
 * @fileoverview Issues and caches the partner JWT required by the to-do status endpoint.
 * @module src/services/radflow/auth/partnerTokenService
 */
import { decodeJwt } from 'jose';
import { z } from 'zod';

import { logger, type RequestContext } from '../../../utils/index.js';
import { fetchWithTimeout } from '../../../utils/network/fetchWithTimeout.js';
import { AuthenticationError } from '../errors.js';
import { PartnerTokenResponseSchema } from '../types.js';
import type { TokenCache } from './tokenCache.js';

export interface PartnerTokenSettings {
  tokenUrl: string;
  partnerApiKey?: string | undefined;
  timeoutMs: number;
}

const nowInSeconds = (): number => Date.now() / 1000;

/**
 * Hands out a bearer token, reusing the cached one while it is fresh.
 *
 * The `exp` claim is read without verifying the signature: the token comes
 * straight from the issuer over TLS and is only forwarded back to it.
 */
export class PartnerTokenService {
  private inFlight: Promise<string> | undefined;

  constructor(
    private readonly cache: TokenCache,
    private readonly settings: PartnerTokenSettings,
  ) {}

  /**
   * @throws {AuthenticationError} When a refresh is needed and fails.
   */
  async getToken(context: RequestContext): Promise<string> {
    const cached = this.cache.get();
    if (cached && this.cache.isFresh(nowInSeconds())) {
      logger.debug('Using cached partner JWT.', context);
      return cached.token;
    }

    // Concurrent callers share one refresh.
    if (!this.inFlight) {
      this.inFlight = this.refresh(context).finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async refresh(context: RequestContext): Promise<string> {
    const { partnerApiKey, tokenUrl, timeoutMs } = this.settings;
    if (!partnerApiKey) {
      throw new AuthenticationError('partner API key is not configured');
    }

    logger.info('Fetching new partner JWT.', context);
    const url = `${tokenUrl}?${new URLSearchParams({ partnerApiKey }).toString()}`;

    let response: Response;
    try {
      response = await fetchWithTimeout(url, timeoutMs, context, {
        method: 'POST',
        headers: { Accept: 'application/json' },
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error('Partner token request failed.', { ...context, reason });
      throw new AuthenticationError(reason, undefined, { cause: error });
    }

    if (!response.ok) {
      logger.error('Partner token endpoint returned an error status.', {
        ...context,
        status: response.status,
      });
      throw new AuthenticationError(
        `token endpoint returned status ${response.status}`,
        { status: response.status },
      );
    }

    const body = await response.text();
    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch (error) {
      throw new AuthenticationError(
        'token endpoint returned invalid JSON',
        undefined,
        { cause: error },
      );
    }

    const envelope = PartnerTokenResponseSchema.safeParse(data);
    if (!envelope.success) {
      throw new AuthenticationError("API response missing 'result' object");
    }

    const jwtToken = z.string().min(1).safeParse(envelope.data.result.jwtToken);
    if (!jwtToken.success) {
      throw new AuthenticationError(
        'JWT token is missing or invalid in API response',
      );
    }

    let expiresAt: number | undefined;
    try {
      expiresAt = decodeJwt(jwtToken.data).exp;
    } catch (error) {
      throw new AuthenticationError('JWT payload could not be decoded', undefined, {
        cause: error,
      });
    }

    if (!expiresAt) {
      throw new AuthenticationError(
        "Expiration time ('exp') not found in JWT payload",
      );
    }

    this.cache.set(jwtToken.data, expiresAt);
    logger.info('Fetched and cached new partner JWT.', {
      ...context,
      expiresAt,
    });
    return jwtToken.data;
  }
}
