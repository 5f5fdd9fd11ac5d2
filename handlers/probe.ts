/**
 * Executes a single timed HTTP request against the target.
 */

import http from 'http';
import https from 'https';
import { systemClock } from './clock';
import { Clock, ProbeOutcome, ProbeTarget, Prober } from '../types/probe';

type ProbeVerdict = Omit<ProbeOutcome, 'timestamp' | 'latencyMs'>;

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'EPIPE',
  'CERT_HAS_EXPIRED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'ERR_TLS_CERT_ALTNAME_INVALID'
]);

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function classifyError(error: Error): ProbeVerdict {
  const code = errorCode(error);
  const isConnectionError =
    code !== undefined &&
    (CONNECTION_ERROR_CODES.has(code) || code.startsWith('ERR_TLS_') || code.startsWith('ERR_SSL_'));

  return {
    success: false,
    statusCode: null,
    error: isConnectionError ? 'connection_error' : 'other',
    detail: code ? `${code}: ${error.message}` : error.message
  };
}

/**
 * Applies the configured response checks: the exact status, then the exact
 * body marker. With neither configured any response counts as a success.
 */
export function classifyResponse(target: ProbeTarget, statusCode: number, body: string): ProbeVerdict {
  if (target.expectedStatus !== null && statusCode !== target.expectedStatus) {
    return {
      success: false,
      statusCode,
      error: 'unexpected_response',
      detail: `Expected status ${target.expectedStatus}, got ${statusCode}`
    };
  }

  if (target.expected !== null && body.trim() !== target.expected) {
    return {
      success: false,
      statusCode,
      error: 'unexpected_response',
      detail: `Expected body "${target.expected}", got "${body.trim().substring(0, 200)}"`
    };
  }

  return { success: true, statusCode, error: null, detail: null };
}

export class HttpProber implements Prober {
  private clock: Clock;

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  probe(target: ProbeTarget, signal?: AbortSignal): Promise<ProbeOutcome> {
    const startTime = this.clock.now();
    const timestamp = {
      wallClock: this.clock.wallClock().toISOString(),
      monotonicMs: Number(startTime.toFixed(3))
    };
    const complete = (verdict: ProbeVerdict): ProbeOutcome => ({
      timestamp,
      latencyMs: Number(Math.max(0, this.clock.now() - startTime).toFixed(2)),
      ...verdict
    });

    let url: URL;
    try {
      url = new URL(target.url);
    } catch {
      return Promise.resolve(complete({ success: false, statusCode: null, error: 'other', detail: `Invalid URL: ${target.url}` }));
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return Promise.resolve(complete({ success: false, statusCode: null, error: 'other', detail: `Unsupported protocol ${url.protocol}` }));
    }

    return new Promise((resolve) => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const finish = (verdict: ProbeVerdict) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(complete(verdict));
      };

      const request = (url.protocol === 'https:' ? https : http).request(
        url,
        {
          method: target.method,
          agent: false,
          headers: { accept: '*/*', 'user-agent': 'stability-probe' }
        },
        (res) => {
          const chunks: Buffer[] = [];

          res.on('data', (chunk: Buffer) => {
            chunks.push(chunk);
          });

          res.on('end', () => {
            finish(classifyResponse(target, res.statusCode ?? 0, Buffer.concat(chunks).toString('utf-8')));
          });

          res.on('error', (error) => {
            finish(classifyError(error));
          });
        }
      );

      const onAbort = () => {
        finish({ success: false, statusCode: null, error: 'other', detail: 'Probe cancelled' });
        request.destroy();
      };

      timer = setTimeout(() => {
        finish({
          success: false,
          statusCode: null,
          error: 'timeout',
          detail: `No response within ${target.timeoutSeconds}s`
        });
        request.destroy();
      }, target.timeoutSeconds * 1000);

      request.on('error', (error) => {
        finish(classifyError(error));
      });

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      request.end();
    });
  }
}
