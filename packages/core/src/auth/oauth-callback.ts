import { createServer } from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { TfmapError, ErrorCode } from '../errors.js';
import { debugLog } from '../utils/debug-log.js';
import { errorMessage } from '../utils/error-utils.js';

export interface OAuthCallbackResult {
  accessToken: string;
  refreshToken?: string;
  expiresIn?: number;
}

const SUCCESS_PAGE =
  '<html><body><h1>Authentication successful!</h1>' +
  '<p>You can close this window and return to the terminal.</p></body></html>';

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function failurePage(reason: string): string {
  return `<html><body><h1>Authentication failed!</h1><p>${escapeHtml(reason)}</p></body></html>`;
}

function oauthFailure(reason: string): TfmapError {
  return new TfmapError(
    `OAuth callback failed: ${reason}`,
    ErrorCode.AUTH_OAUTH_FAILED,
    `Sign-in did not complete: ${reason}. Run "tfmap auth" to try again.`
  );
}

/**
 * One-shot loopback listener for the token redirect. Each `receive` call owns
 * its own server and settles exactly once.
 */
export class OAuthCallbackListener {
  constructor(
    private readonly port: number,
    private readonly path = '/callback',
    private readonly host = 'localhost'
  ) {}

  /**
   * Listen until the first request to the callback path, then close. `onListening`
   * receives the redirect URI once the port is bound; its rejection fails the wait.
   */
  receive(
    timeoutMs: number,
    onListening?: (redirectUri: string) => void | Promise<void>
  ): Promise<OAuthCallbackResult> {
    return new Promise<OAuthCallbackResult>((resolve, reject) => {
      let settled = false;

      const finish = (outcome: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        server.close();
        server.closeIdleConnections();
        outcome();
      };

      const handle = (req: IncomingMessage, res: ServerResponse) => {
        const url = new URL(req.url ?? '/', `http://${this.host}`);
        if (url.pathname !== this.path || settled) {
          res.writeHead(404).end();
          return;
        }

        const accessToken = url.searchParams.get('access_token');
        const refreshToken = url.searchParams.get('refresh_token') ?? undefined;
        const expiresRaw = url.searchParams.get('expires_in');
        const expiresIn = expiresRaw ? parseInt(expiresRaw, 10) : undefined;
        const reason = url.searchParams.get('error') ?? 'No access token received';

        res.writeHead(200, { 'Content-Type': 'text/html' });
        res.end(accessToken ? SUCCESS_PAGE : failurePage(reason), () => {
          finish(() => {
            if (accessToken) {
              resolve({
                accessToken,
                ...(refreshToken ? { refreshToken } : {}),
                ...(expiresIn !== undefined && !isNaN(expiresIn) ? { expiresIn } : {}),
              });
            } else {
              reject(oauthFailure(reason));
            }
          });
        });
      };

      const server = createServer(handle);
      const timer = setTimeout(() => {
        finish(() => {
          reject(oauthFailure(`no callback within ${String(Math.round(timeoutMs / 1000))}s`));
        });
      }, timeoutMs);

      server.once('error', (error) => {
        finish(() => {
          reject(oauthFailure(`callback listener error: ${errorMessage(error)}`));
        });
      });

      server.listen(this.port, this.host, () => {
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.port;
        const redirectUri = `http://${this.host}:${String(port)}${this.path}`;
        debugLog('auth', `Waiting for OAuth callback on ${redirectUri}`);
        if (!onListening) return;
        const notify = onListening;
        Promise.resolve()
          .then(() => notify(redirectUri))
          .catch((error: unknown) => {
            finish(() => {
              reject(error);
            });
          });
      });
    });
  }
}
