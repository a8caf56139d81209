import { describe, expect, it } from 'vitest';
import { describeError, fail, ok, safeError, VerificationFailure } from '../../src/utils/errors.js';

describe('describeError', () => {
  it('names the tried ports for a missing listener', () => {
    expect(describeError({ kind: 'NoListener', host: 'deploy.test', ports: [443, 9443] })).toBe(
      'No HTTPS listener on deploy.test (tried ports 443, 9443).',
    );
  });

  it('includes the preview of a non-HTML document', () => {
    expect(describeError({ kind: 'ContentInvalid', reason: 'not_html', preview: 'plain text' })).toBe(
      'Root document does not look like HTML:\nplain text',
    );
    expect(describeError({ kind: 'ContentInvalid', reason: 'empty', preview: '' })).toBe('Root document is empty.');
    expect(
      describeError({ kind: 'ContentInvalid', reason: 'http_status', statusCode: 500, preview: '<h1>oops</h1>' }),
    ).toBe('Root document returned HTTP 500:\n<h1>oops</h1>');
  });

  it('describes a restart that never came back', () => {
    expect(describeError({ kind: 'RestartTimeout', attempts: 10, intervalMs: 1000 })).toBe(
      'Service did not come back after 10 liveness checks 1000ms apart.',
    );
  });
});

describe('result helpers', () => {
  it('wraps values and errors', () => {
    expect(ok(3)).toEqual({ ok: true, value: 3 });
    expect(fail({ kind: 'InternalError', message: 'x' })).toEqual({
      ok: false,
      error: { kind: 'InternalError', message: 'x' },
    });
  });

  it('carries the typed error through a thrown VerificationFailure', () => {
    const failure = new VerificationFailure({ kind: 'Timeout', target: 'https://deploy.test/', timeoutMs: 15000 });

    expect(failure.message).toBe('https://deploy.test/ did not respond within 15000ms.');
    expect(failure.error.kind).toBe('Timeout');
    expect(safeError(failure)).toBe(failure.message);
    expect(safeError('plain')).toBe('plain');
  });
});
