import { afterEach, describe, expect, it, vi } from 'vitest';
import { X509Certificate } from 'node:crypto';
import { readFileSync } from 'node:fs';
import http from 'node:http';
import https from 'node:https';
import net from 'node:net';
import tls from 'node:tls';
import { fileURLToPath } from 'node:url';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
}));

import {
  fetchCertFingerprint,
  formatFingerprint,
  httpGet,
  httpsGet,
  tcpReachable,
} from '../../src/services/probes.js';
import type { HttpsGetOptions } from '../../src/types/verification.js';
import { PRIMARY_TLS_OPTIONS } from '../../src/services/verification-pipeline.js';

function fixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`../fixtures/tls/${name}`, import.meta.url)), 'utf8');
}

const CERT_A = fixture('server-a.crt');
const KEY_A = fixture('server-a.key');
const CERT_B = fixture('server-b.crt');
const KEY_B = fixture('server-b.key');

const QUICK_TLS: HttpsGetOptions = {
  ...PRIMARY_TLS_OPTIONS,
  retryCount: 0,
  retryDelayMs: 0,
  connectTimeoutMs: 2_000,
  maxTimeMs: 2_000,
};

const servers: net.Server[] = [];
const connections = new Set<net.Socket>();

async function listen<T extends net.Server>(server: T): Promise<number> {
  servers.push(server);
  server.on('connection', (socket: net.Socket) => {
    connections.add(socket);
    socket.once('close', () => connections.delete(socket));
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server has no TCP address');
  }
  return address.port;
}

async function closedPort(): Promise<number> {
  const server = net.createServer();
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  if (address === null || typeof address === 'string') {
    throw new Error('server has no TCP address');
  }
  return address.port;
}

function htmlHandler(_request: http.IncomingMessage, response: http.ServerResponse): void {
  response.writeHead(200, { 'content-type': 'text/html' });
  response.end('<html><body>ok</body></html>');
}

afterEach(async () => {
  for (const socket of connections) {
    socket.destroy();
  }
  connections.clear();
  await Promise.all(
    servers.splice(0).map(
      (server) =>
        new Promise<void>((resolve) => {
          if (server instanceof http.Server) {
            server.closeAllConnections();
          }
          server.close(() => resolve());
        }),
    ),
  );
});

describe('formatFingerprint', () => {
  it('matches the runtime SHA-256 fingerprint of the certificate', () => {
    const certificate = new X509Certificate(CERT_A);
    expect(formatFingerprint(certificate.raw)).toBe(certificate.fingerprint256);
  });
});

describe('tcpReachable', () => {
  it('is true for a listening port and false for a closed one', async () => {
    const port = await listen(net.createServer((socket) => socket.end()));
    const closed = await closedPort();

    expect(await tcpReachable('127.0.0.1', port, 1_000)).toBe(true);
    expect(await tcpReachable('127.0.0.1', closed, 1_000)).toBe(false);
  });
});

describe('httpGet', () => {
  it('returns the status, body and a transcript of the exchange', async () => {
    const port = await listen(http.createServer(htmlHandler));

    const result = await httpGet(`http://127.0.0.1:${port}/`, { connectTimeoutMs: 1_000, maxTimeMs: 2_000 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.statusCode).toBe(200);
    expect(result.value.body).toBe('<html><body>ok</body></html>');
    expect(result.value.headers['content-type']).toBe('text/html');
    expect(result.value.transcript.split('\n')).toEqual([
      `* Trying 127.0.0.1:${port}...`,
      `* Connected to 127.0.0.1 port ${port}`,
      '< HTTP/1.1 200 OK',
      '* Received 28 bytes',
    ]);
  });

  it('reports a refused connection as Unreachable', async () => {
    const port = await closedPort();

    const result = await httpGet(`http://127.0.0.1:${port}/`, { connectTimeoutMs: 1_000, maxTimeMs: 2_000 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('Unreachable');
    expect(result.transcript).toContain('ECONNREFUSED');
  });

  it('reports a server that never answers as Timeout', async () => {
    const port = await listen(http.createServer(() => undefined));

    const result = await httpGet(`http://127.0.0.1:${port}/`, { connectTimeoutMs: 1_000, maxTimeMs: 200 });

    expect(result).toMatchObject({
      ok: false,
      error: { kind: 'Timeout', target: `http://127.0.0.1:${port}/`, timeoutMs: 200 },
    });
    expect(result.ok ? '' : result.transcript).toContain('* Operation timed out after 200 milliseconds');
  });
});

describe('httpsGet', () => {
  it('accepts a self-signed certificate when peer verification is off', async () => {
    const port = await listen(https.createServer({ key: KEY_A, cert: CERT_A }, htmlHandler));

    const result = await httpsGet(`https://127.0.0.1:${port}/`, QUICK_TLS);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.body).toBe('<html><body>ok</body></html>');
    expect(result.value.transcript).toContain('# attempt 1');
    expect(result.value.transcript).toContain('* SSL connection using TLSv1.');
  });

  it('rejects the self-signed certificate when peer verification is on', async () => {
    const port = await listen(https.createServer({ key: KEY_A, cert: CERT_A }, htmlHandler));

    const result = await httpsGet(`https://127.0.0.1:${port}/`, { ...QUICK_TLS, verifyPeer: true });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('Unreachable');
    expect(result.error.kind === 'Unreachable' && result.error.reason).toContain('SELF_SIGNED');
  });

  it('retries retryCount times with the configured delay and keeps every transcript', async () => {
    const port = await closedPort();
    const sleeps: number[] = [];

    const result = await httpsGet(
      `https://127.0.0.1:${port}/`,
      { ...QUICK_TLS, retryCount: 2, retryDelayMs: 1_000 },
      async (ms) => {
        sleeps.push(ms);
      },
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('Unreachable');
    expect(sleeps).toEqual([1_000, 1_000]);
    expect(result.transcript).toContain('# attempt 1');
    expect(result.transcript).toContain('# attempt 3');
    expect(result.transcript).not.toContain('# attempt 4');
  });
});

describe('fetchCertFingerprint', () => {
  it('returns the SHA-256 fingerprint of the presented certificate', async () => {
    const port = await listen(tls.createServer({ key: KEY_A, cert: CERT_A }, (socket) => socket.end()));

    const result = await fetchCertFingerprint('127.0.0.1', port, 2_000);

    expect(result).toEqual({ ok: true, value: new X509Certificate(CERT_A).fingerprint256 });
  });

  it('tells two different certificates apart', async () => {
    const portA = await listen(tls.createServer({ key: KEY_A, cert: CERT_A }, (socket) => socket.end()));
    const portB = await listen(tls.createServer({ key: KEY_B, cert: CERT_B }, (socket) => socket.end()));

    const first = await fetchCertFingerprint('127.0.0.1', portA, 2_000);
    const second = await fetchCertFingerprint('127.0.0.1', portB, 2_000);

    expect(first.ok && second.ok).toBe(true);
    expect(first.ok && first.value).not.toBe(second.ok && second.value);
    expect(second).toEqual({ ok: true, value: new X509Certificate(CERT_B).fingerprint256 });
  });

  it('reports a closed port as Unreachable', async () => {
    const port = await closedPort();

    const result = await fetchCertFingerprint('127.0.0.1', port, 2_000);

    expect(result).toMatchObject({ ok: false, error: { kind: 'Unreachable', target: `127.0.0.1:${port}` } });
  });

  it('times out when the peer never completes a handshake', async () => {
    const port = await listen(net.createServer(() => undefined));

    const result = await fetchCertFingerprint('127.0.0.1', port, 200);

    expect(result).toEqual({ ok: false, error: { kind: 'Timeout', target: `127.0.0.1:${port}`, timeoutMs: 200 } });
  });
});
