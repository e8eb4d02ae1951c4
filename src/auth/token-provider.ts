import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { AuthenticationError } from '../utils/errors.js';

const logger = createLogger('token-provider');

/** Refresh this long before the token actually expires */
const TOKEN_REFRESH_BUFFER_MS = 5 * 60 * 1000;

export interface TokenProvider {
  getToken(): Promise<string>;
}

export class StaticTokenProvider implements TokenProvider {
  constructor(private readonly token: string) {}

  async getToken(): Promise<string> {
    return this.token;
  }
}

export interface ClientCredentialsConfig {
  tenantId: string;
  clientId: string;
  clientSecret: string;
  /** e.g. https://login.microsoftonline.com */
  authorityUrl: string;
  /** e.g. https://graph.microsoft.com/.default */
  scope: string;
  http?: AxiosInstance;
  now?: () => number;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive(),
});

interface CachedToken {
  token: string;
  expiresAt: number;
}

/**
 * OAuth2 client-credentials flow against the directory's token endpoint,
 * cached until shortly before expiry.
 */
export class ClientCredentialsTokenProvider implements TokenProvider {
  private cached: CachedToken | null = null;
  private pending: Promise<string> | null = null;
  private readonly http: AxiosInstance;
  private readonly now: () => number;

  constructor(private readonly config: ClientCredentialsConfig) {
    this.http = config.http ?? axios.create({ timeout: 30000 });
    this.now = config.now ?? Date.now;
  }

  get tokenUrl(): string {
    const authority = this.config.authorityUrl.replace(/\/+$/, '');
    return `${authority}/${encodeURIComponent(this.config.tenantId)}/oauth2/v2.0/token`;
  }

  async getToken(): Promise<string> {
    if (this.cached && this.cached.expiresAt - TOKEN_REFRESH_BUFFER_MS > this.now()) {
      return this.cached.token;
    }
    // Concurrent callers share one refresh.
    if (!this.pending) {
      this.pending = this.requestToken().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async requestToken(): Promise<string> {
    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
      scope: this.config.scope,
    });

    let data: unknown;
    try {
      const response = await this.http.post(this.tokenUrl, body.toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      });
      data = response.data;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Token request failed', { tokenUrl: this.tokenUrl, error: message });
      throw new AuthenticationError(`Token request failed: ${message}`, { tokenUrl: this.tokenUrl }, 401, error instanceof Error ? error : undefined);
    }

    const parsed = TokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new AuthenticationError('Token endpoint returned no access_token', { tokenUrl: this.tokenUrl });
    }

    this.cached = {
      token: parsed.data.access_token,
      expiresAt: this.now() + parsed.data.expires_in * 1000,
    };
    logger.debug('Acquired access token', { expiresIn: parsed.data.expires_in });
    return this.cached.token;
  }
}

/** Scope for the client-credentials grant: the Graph origin plus /.default */
export function defaultScopeFor(graphBaseUrl: string): string {
  return `${new URL(graphBaseUrl).origin}/.default`;
}
