import type { ProbeResult, VerificationError } from '../types/verification.js';

/** Carries a {@link VerificationError} through APIs that only understand thrown errors. */
export class VerificationFailure extends Error {
  readonly error: VerificationError;

  constructor(error: VerificationError) {
    super(describeError(error));
    this.name = 'VerificationFailure';
    this.error = error;
  }
}

export function ok<T>(value: T): ProbeResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: VerificationError): ProbeResult<T> {
  return { ok: false, error };
}

export function safeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function describeError(error: VerificationError): string {
  switch (error.kind) {
    case 'BuildFailure':
      return `Build failed (exit ${error.exitCode}).`;
    case 'Unreachable':
      return `${error.target} is unreachable: ${error.reason}`;
    case 'Timeout':
      return `${error.target} did not respond within ${error.timeoutMs}ms.`;
    case 'NoListener':
      return `No HTTPS listener on ${error.host} (tried ports ${error.ports.join(', ')}).`;
    case 'ProtocolFailure':
      return `HTTPS failed for ${error.url} with all TLS options (primary: ${error.primary}; fallback: ${error.fallback}).`;
    case 'NoCertificate':
      return `${error.host}:${error.port} completed a TLS handshake without presenting a certificate.`;
    case 'Drift':
      return (
        `Certificate changed during ${error.condition} check on port ${error.port}: ` +
        `first ${error.first}, second ${error.second}.`
      );
    case 'ContentInvalid':
      if (error.reason === 'http_status') {
        return `Root document returned HTTP ${error.statusCode}:\n${error.preview}`;
      }
      return error.reason === 'empty'
        ? 'Root document is empty.'
        : `Root document does not look like HTML:\n${error.preview}`;
    case 'RestartTimeout':
      return `Service did not come back after ${error.attempts} liveness checks ${error.intervalMs}ms apart.`;
    case 'RemoteCommandFailure':
      return `Remote command failed (exit ${error.exitCode}): ${error.command}`;
    case 'ConfigInvalid':
      return `Invalid configuration: ${error.errors.join(' ')}`;
    case 'InternalError':
      return `Unexpected error: ${error.message}`;
  }
}
