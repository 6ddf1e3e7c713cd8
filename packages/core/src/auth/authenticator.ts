import { spawn } from 'node:child_process';
import { join } from 'node:path';
import { TfmapError, ErrorCode } from '../errors.js';
import { OAuthAuthorizeResponseSchema } from '../schemas/tmi-api.schema.js';
import type { Config } from '../utils/config.js';
import { CONFIG } from '../utils/config.js';
import { debugLog } from '../utils/debug-log.js';
import { errorMessage } from '../utils/error-utils.js';
import { OAuthCallbackListener } from './oauth-callback.js';
import { TokenCache } from './token-cache.js';

const OAUTH_SCOPE = 'openid profile email';
const DEFAULT_EXPIRES_IN = 3600;
export const TOKEN_CACHE_FILE = 'token.json';

export interface AuthenticatorOptions {
  serverUrl: string;
  idp: string;
  callbackPort: number;
  timeoutMs: number;
  cache: TokenCache;
  listener?: OAuthCallbackListener;
  openBrowser?: (url: string) => Promise<void>;
  /** Called with the sign-in URL before the browser opens, so it can be shown. */
  onAuthorizationUrl?: (url: string) => void;
}

/** Launch the platform's URL opener without waiting for it to exit. */
export function openInBrowser(url: string): Promise<void> {
  const [command, args]: [string, string[]] =
    process.platform === 'darwin'
      ? ['open', [url]]
      : process.platform === 'win32'
        ? ['cmd', ['/c', 'start', '""', url]]
        : ['xdg-open', [url]];

  return new Promise((resolve) => {
    const child = spawn(command, args, { detached: true, stdio: 'ignore' });
    child.once('error', (error) => {
      debugLog('auth', `Could not open a browser with ${command}`, { error: errorMessage(error) });
      resolve();
    });
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}

export class TmiAuthenticator {
  private readonly listener: OAuthCallbackListener;
  private readonly openBrowser: (url: string) => Promise<void>;

  constructor(private readonly options: AuthenticatorOptions) {
    this.listener = options.listener ?? new OAuthCallbackListener(options.callbackPort);
    this.openBrowser = options.openBrowser ?? openInBrowser;
  }

  get cache(): TokenCache {
    return this.options.cache;
  }

  /** A cached token unless `forceRefresh`, otherwise a fresh one from the browser sign-in. */
  async getToken({ forceRefresh = false }: { forceRefresh?: boolean } = {}): Promise<string> {
    if (!forceRefresh) {
      const cached = await this.options.cache.load();
      if (cached) {
        debugLog('auth', 'Using cached token');
        return cached;
      }
    }

    const result = await this.listener.receive(this.options.timeoutMs, async (redirectUri) => {
      const url = await this.authorizationUrl(redirectUri);
      this.options.onAuthorizationUrl?.(url);
      await this.openBrowser(url);
    });

    await this.options.cache.save(result.accessToken, result.expiresIn ?? DEFAULT_EXPIRES_IN);
    return result.accessToken;
  }

  /** Sign-in URL from the server: its redirect target, or `authorization_url` in a JSON body. */
  async authorizationUrl(redirectUri: string): Promise<string> {
    const params = new URLSearchParams({
      idp: this.options.idp,
      client_callback: redirectUri,
      scope: OAUTH_SCOPE,
    });
    const endpoint = `${this.options.serverUrl.replace(/\/+$/, '')}/oauth2/authorize?${params.toString()}`;

    let response: Response;
    try {
      response = await fetch(endpoint, { redirect: 'manual' });
    } catch (error) {
      throw authorizeFailure(errorMessage(error));
    }

    const location = response.headers.get('location');
    if (response.status >= 300 && response.status < 400 && location) {
      return location;
    }
    if (!response.ok) {
      throw authorizeFailure(`server responded ${String(response.status)}`);
    }

    const body: unknown = await response.json().catch((): unknown => null);
    const parsed = OAuthAuthorizeResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw authorizeFailure('response carried no authorization_url');
    }
    return parsed.data.authorization_url;
  }

  clearCachedToken(): Promise<void> {
    return this.options.cache.clear();
  }
}

function authorizeFailure(reason: string): TfmapError {
  return new TfmapError(
    `Failed to get authorization URL: ${reason}`,
    ErrorCode.AUTH_OAUTH_FAILED,
    `Could not start sign-in with the TMI server: ${reason}`
  );
}

export function createAuthenticator(
  hooks: Pick<AuthenticatorOptions, 'onAuthorizationUrl' | 'openBrowser'> = {},
  config: Config = CONFIG
): TmiAuthenticator {
  return new TmiAuthenticator({
    serverUrl: config.tmi.serverUrl,
    idp: config.tmi.oauthIdp,
    callbackPort: config.tmi.callbackPort,
    timeoutMs: config.tmi.authTimeout,
    cache: new TokenCache(join(config.tmi.cacheDir, TOKEN_CACHE_FILE)),
    ...hooks,
  });
}
