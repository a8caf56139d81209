import type { CertificateAuthorityMode, ServiceMode } from '../types/verification.js';
import type { RunConfig } from './run-config.js';

type JsonRecord = Record<string, unknown>;

export interface RunConfigValidationResult {
  valid: boolean;
  errors: string[];
  config?: RunConfig;
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readRequiredObject(parent: JsonRecord, key: string, errors: string[]): JsonRecord {
  const value = parent[key];
  if (!isRecord(value)) {
    errors.push(`${key} must be an object.`);
    return {};
  }
  return value;
}

function readRequiredString(
  parent: JsonRecord,
  key: string,
  path: string,
  errors: string[],
): string {
  const value = parent[key];
  if (typeof value !== 'string') {
    errors.push(`${path} must be a string.`);
    return '';
  }
  if (value.trim().length === 0) {
    errors.push(`${path} must be a non-empty string.`);
  }
  return value;
}

function readRequiredIntegerInRange(
  parent: JsonRecord,
  key: string,
  path: string,
  min: number,
  max: number,
  errors: string[],
): number {
  const value = parent[key];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    errors.push(`${path} must be an integer.`);
    return min;
  }
  if (value < min || value > max) {
    errors.push(`${path} must be between ${min} and ${max}.`);
  }
  return value;
}

function readStringArray(parent: JsonRecord, key: string, path: string, errors: string[]): string[] {
  const value = parent[key];
  if (!Array.isArray(value)) {
    errors.push(`${path} must be an array of strings.`);
    return [];
  }
  const strings = value.filter((entry): entry is string => typeof entry === 'string');
  if (strings.length !== value.length) {
    errors.push(`${path} must be an array of strings.`);
  }
  return strings;
}

function readCertificateAuthority(root: JsonRecord, errors: string[]): CertificateAuthorityMode {
  const value = root['certificateAuthority'];
  if (value === 'staging' || value === 'production') {
    return value;
  }
  errors.push(`certificateAuthority must be 'staging' or 'production'.`);
  return 'production';
}

function readServiceMode(parent: JsonRecord, key: string, path: string, errors: string[]): ServiceMode {
  const value = parent[key];
  if (value === 'privileged' || value === 'unprivileged') {
    return value;
  }
  errors.push(`${path} must be 'privileged' or 'unprivileged'.`);
  return 'privileged';
}

const MAX_TIMEOUT_MS = 3_600_000;
const MAX_PORT = 65_535;

/**
 * Validate a merged configuration record and build the typed {@link RunConfig}.
 * Every bad field contributes one error; `config` is only set when there are none.
 */
export function validateRunConfig(input: unknown): RunConfigValidationResult {
  const errors: string[] = [];
  if (!isRecord(input)) {
    return { valid: false, errors: ['Configuration root must be a JSON object.'] };
  }

  const target = readRequiredObject(input, 'target', errors);
  const build = readRequiredObject(input, 'build', errors);
  const service = readRequiredObject(input, 'service', errors);
  const ports = readRequiredObject(input, 'ports', errors);
  const timing = readRequiredObject(input, 'timing', errors);
  const diagnostics = readRequiredObject(input, 'diagnostics', errors);
  const reports = readRequiredObject(input, 'reports', errors);

  const config: RunConfig = {
    target: {
      defaultHostFile: readRequiredString(target, 'defaultHostFile', 'target.defaultHostFile', errors),
      sshUser: readRequiredString(target, 'sshUser', 'target.sshUser', errors),
    },
    certificateAuthority: readCertificateAuthority(input, errors),
    build: {
      profile: readRequiredString(build, 'profile', 'build.profile', errors),
      command: readRequiredString(build, 'command', 'build.command', errors),
      artifactPath: readRequiredString(build, 'artifactPath', 'build.artifactPath', errors),
      sourceDirs: readStringArray(build, 'sourceDirs', 'build.sourceDirs', errors),
      timeoutMs: readRequiredIntegerInRange(build, 'timeoutMs', 'build.timeoutMs', 1, MAX_TIMEOUT_MS, errors),
    },
    service: {
      binaryName: readRequiredString(service, 'binaryName', 'service.binaryName', errors),
      documentRoot: readRequiredString(service, 'documentRoot', 'service.documentRoot', errors),
      certStorageRoot: readRequiredString(service, 'certStorageRoot', 'service.certStorageRoot', errors),
      logFile: readRequiredString(service, 'logFile', 'service.logFile', errors),
      extraFlags: readStringArray(service, 'extraFlags', 'service.extraFlags', errors),
      unprivilegedFlag: readRequiredString(service, 'unprivilegedFlag', 'service.unprivilegedFlag', errors),
      launchMode: readServiceMode(service, 'launchMode', 'service.launchMode', errors),
    },
    ports: {
      http: readRequiredIntegerInRange(ports, 'http', 'ports.http', 1, MAX_PORT, errors),
      privileged: readRequiredIntegerInRange(ports, 'privileged', 'ports.privileged', 1, MAX_PORT, errors),
      unprivileged: readRequiredIntegerInRange(ports, 'unprivileged', 'ports.unprivileged', 1, MAX_PORT, errors),
    },
    timing: {
      startupSettleMs: readRequiredIntegerInRange(timing, 'startupSettleMs', 'timing.startupSettleMs', 0, MAX_TIMEOUT_MS, errors),
      stageGapMs: readRequiredIntegerInRange(timing, 'stageGapMs', 'timing.stageGapMs', 0, MAX_TIMEOUT_MS, errors),
      sessionSettleMs: readRequiredIntegerInRange(timing, 'sessionSettleMs', 'timing.sessionSettleMs', 0, MAX_TIMEOUT_MS, errors),
      livenessAttempts: readRequiredIntegerInRange(timing, 'livenessAttempts', 'timing.livenessAttempts', 1, 1_000, errors),
      livenessIntervalMs: readRequiredIntegerInRange(timing, 'livenessIntervalMs', 'timing.livenessIntervalMs', 0, MAX_TIMEOUT_MS, errors),
      tcpTimeoutMs: readRequiredIntegerInRange(timing, 'tcpTimeoutMs', 'timing.tcpTimeoutMs', 1, MAX_TIMEOUT_MS, errors),
      fingerprintTimeoutMs: readRequiredIntegerInRange(timing, 'fingerprintTimeoutMs', 'timing.fingerprintTimeoutMs', 1, MAX_TIMEOUT_MS, errors),
      remoteCommandTimeoutMs: readRequiredIntegerInRange(timing, 'remoteCommandTimeoutMs', 'timing.remoteCommandTimeoutMs', 1, MAX_TIMEOUT_MS, errors),
    },
    diagnostics: {
      failureTailLines: readRequiredIntegerInRange(diagnostics, 'failureTailLines', 'diagnostics.failureTailLines', 1, 10_000, errors),
      startupTailLines: readRequiredIntegerInRange(diagnostics, 'startupTailLines', 'diagnostics.startupTailLines', 0, 10_000, errors),
      bodyPreviewLines: readRequiredIntegerInRange(diagnostics, 'bodyPreviewLines', 'diagnostics.bodyPreviewLines', 1, 1_000, errors),
    },
    reports: {
      dir: readRequiredString(reports, 'dir', 'reports.dir', errors),
    },
  };

  if (Array.isArray(build['sourceDirs']) && build['sourceDirs'].length === 0) {
    errors.push('build.sourceDirs must list at least one directory.');
  }
  if (config.ports.privileged === config.ports.unprivileged) {
    errors.push('ports.privileged and ports.unprivileged must differ.');
  }

  return errors.length === 0 ? { valid: true, errors, config } : { valid: false, errors };
}
