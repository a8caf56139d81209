import { createHash } from 'node:crypto';
import http from 'node:http';
import https from 'node:https';
import net from 'node:net';
import tls from 'node:tls';
import type {
  HttpGetOptions,
  HttpResponse,
  HttpsGetOptions,
  ProbeResult,
  ProbeSuite,
  VerificationError,
} from '../types/verification.js';
import { fail, ok, safeError, VerificationFailure } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';
import { withRetry, type Sleeper } from '../utils/retry.js';

interface TlsRequestOptions {
  minVersion: tls.SecureVersion;
  maxVersion: tls.SecureVersion;
  ciphers?: string;
  rejectUnauthorized: boolean;
}

function errorCode(err: unknown): string {
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    return code ? `${code}: ${err.message}` : err.message;
  }
  return String(err);
}

function sniName(host: string): string | undefined {
  return net.isIP(host) === 0 ? host : undefined;
}

/** `AB:CD:...` form, the same shape `openssl x509 -fingerprint -sha256` prints. */
export function formatFingerprint(der: Buffer): string {
  const hex = createHash('sha256').update(der).digest('hex').toUpperCase();
  return hex.match(/.{2}/g)?.join(':') ?? hex;
}

export function tcpReachable(host: string, port: number, timeoutMs: number): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    let settled = false;
    const socket = net.createConnection({ host, port });
    const finish = (reachable: boolean): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      resolve(reachable);
    };
    const timer = setTimeout(() => finish(false), timeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('error', () => finish(false));
  });
}

function requestOnce(
  url: URL,
  options: HttpGetOptions,
  tlsOptions?: TlsRequestOptions,
): Promise<ProbeResult<HttpResponse>> {
  return new Promise<ProbeResult<HttpResponse>>((resolve) => {
    const port = url.port || (url.protocol === 'https:' ? '443' : '80');
    const transcript: string[] = [`* Trying ${url.hostname}:${port}...`];
    let settled = false;

    const settle = (result: ProbeResult<HttpResponse>): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(connectTimer);
      clearTimeout(overallTimer);
      if (!result.ok) {
        request.destroy();
        resolve({ ...result, transcript: transcript.join('\n') });
        return;
      }
      resolve(result);
    };

    const timeoutError = (timeoutMs: number, phase: string): VerificationError => {
      transcript.push(`* ${phase} timed out after ${timeoutMs} milliseconds`);
      return { kind: 'Timeout', target: url.toString(), timeoutMs };
    };

    const baseOptions: http.RequestOptions = {
      method: 'GET',
      agent: false,
      headers: { accept: 'text/html,*/*', 'user-agent': 'release-verify' },
    };
    const request = tlsOptions
      ? https.request(url, {
          ...baseOptions,
          servername: sniName(url.hostname),
          minVersion: tlsOptions.minVersion,
          maxVersion: tlsOptions.maxVersion,
          ciphers: tlsOptions.ciphers,
          rejectUnauthorized: tlsOptions.rejectUnauthorized,
        })
      : http.request(url, baseOptions);

    const connectTimer = setTimeout(
      () => settle(fail(timeoutError(options.connectTimeoutMs, 'Connection'))),
      options.connectTimeoutMs,
    );
    const overallTimer = setTimeout(
      () => settle(fail(timeoutError(options.maxTimeMs, 'Operation'))),
      options.maxTimeMs,
    );

    request.on('socket', (socket) => {
      socket.once('connect', () => {
        clearTimeout(connectTimer);
        transcript.push(`* Connected to ${url.hostname} port ${port}`);
      });
      if (socket instanceof tls.TLSSocket) {
        socket.once('secureConnect', () => {
          const cipher = socket.getCipher();
          transcript.push(`* SSL connection using ${socket.getProtocol() ?? 'unknown'} / ${cipher.name}`);
        });
      }
    });

    request.on('response', (response) => {
      transcript.push(`< HTTP/${response.httpVersion} ${response.statusCode ?? 0} ${response.statusMessage ?? ''}`.trimEnd());
      const chunks: Buffer[] = [];
      response.on('data', (chunk: Buffer) => chunks.push(chunk));
      response.on('error', (err) => {
        transcript.push(`* Response error: ${errorCode(err)}`);
        settle(fail({ kind: 'Unreachable', target: url.toString(), reason: errorCode(err) }));
      });
      response.on('end', () => {
        const headers: Record<string, string> = {};
        for (const [name, value] of Object.entries(response.headers)) {
          if (value !== undefined) {
            headers[name] = Array.isArray(value) ? value.join(', ') : value;
          }
        }
        const body = Buffer.concat(chunks).toString('utf8');
        transcript.push(`* Received ${body.length} bytes`);
        settle(
          ok({
            statusCode: response.statusCode ?? 0,
            headers,
            body,
            transcript: transcript.join('\n'),
          }),
        );
      });
    });

    request.on('error', (err) => {
      transcript.push(`* Error: ${errorCode(err)}`);
      settle(fail({ kind: 'Unreachable', target: url.toString(), reason: errorCode(err) }));
    });

    request.end();
  });
}

function parseUrl(raw: string): ProbeResult<URL> {
  try {
    return ok(new URL(raw));
  } catch (err) {
    return fail({ kind: 'Unreachable', target: raw, reason: `invalid URL: ${safeError(err)}` });
  }
}

export async function httpGet(url: string, options: HttpGetOptions): Promise<ProbeResult<HttpResponse>> {
  const parsed = parseUrl(url);
  if (!parsed.ok) {
    return parsed;
  }
  return requestOnce(parsed.value, options);
}

export async function httpsGet(
  url: string,
  options: HttpsGetOptions,
  sleeper?: Sleeper,
): Promise<ProbeResult<HttpResponse>> {
  const parsed = parseUrl(url);
  if (!parsed.ok) {
    return parsed;
  }

  const tlsOptions: TlsRequestOptions = {
    minVersion: options.tlsMin,
    maxVersion: options.tlsMax,
    ciphers: options.ciphers,
    rejectUnauthorized: options.verifyPeer,
  };
  const transcripts: string[] = [];
  const failures: VerificationError[] = [];

  const retried = await withRetry(
    async (attempt) => {
      const result = await requestOnce(parsed.value, options, tlsOptions);
      const attemptTranscript = result.ok ? result.value.transcript : (result.transcript ?? '');
      transcripts.push(`# attempt ${attempt}\n${attemptTranscript}`);
      if (!result.ok) {
        failures.push(result.error);
        throw new VerificationFailure(result.error);
      }
      return result.value;
    },
    {
      maxAttempts: options.retryCount + 1,
      baseDelayMs: options.retryDelayMs,
      backoffFactor: 1,
      label: `https:${parsed.value.host}`,
      sleep: sleeper,
    },
  );

  const transcript = transcripts.join('\n');
  if (retried.ok && retried.value) {
    return ok({ ...retried.value, transcript });
  }
  const error: VerificationError = failures.at(-1) ?? {
    kind: 'Unreachable',
    target: url,
    reason: retried.error ?? 'no attempt completed',
  };
  return { ok: false, error, transcript };
}

export function fetchCertFingerprint(host: string, port: number, timeoutMs: number): Promise<ProbeResult<string>> {
  return new Promise<ProbeResult<string>>((resolve) => {
    const target = `${host}:${port}`;
    let settled = false;
    const socket = tls.connect({
      host,
      port,
      servername: sniName(host),
      rejectUnauthorized: false,
    });

    const settle = (result: ProbeResult<string>): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      resolve(result);
    };

    const timer = setTimeout(() => settle(fail({ kind: 'Timeout', target, timeoutMs })), timeoutMs);

    socket.once('secureConnect', () => {
      const certificate = socket.getPeerCertificate();
      if (!certificate || !certificate.raw || certificate.raw.length === 0) {
        settle(fail({ kind: 'NoCertificate', host, port }));
        return;
      }
      settle(ok(formatFingerprint(certificate.raw)));
    });
    socket.once('error', (err) => {
      settle(fail({ kind: 'Unreachable', target, reason: errorCode(err) }));
    });
  });
}

/** Wire the real network probes behind the {@link ProbeSuite} seam. */
export function createProbeSuite(sleeper?: Sleeper): ProbeSuite {
  return {
    tcpReachable,
    httpGet,
    httpsGet: (url, options) => httpsGet(url, options, sleeper),
    fetchCertFingerprint: async (host, port, timeoutMs) => {
      const result = await fetchCertFingerprint(host, port, timeoutMs);
      if (result.ok) {
        await logThought(`[Probe] ${host}:${port} certificate SHA-256 ${result.value}`);
      }
      return result;
    },
  };
}
