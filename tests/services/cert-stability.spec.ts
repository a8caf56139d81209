import { describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
}));

import { DEFAULT_CONFIG } from '../../src/config/run-config.js';
import { CertificateStabilityChecker } from '../../src/services/cert-stability.js';
import {
  FINGERPRINT_A,
  FINGERPRINT_B,
  FakeProbes,
  FakeRemote,
  recordingSleep,
  testConfig,
  type FakeProbesOptions,
} from '../harness/fakes.js';

const NOW = new Date('2026-03-04T05:06:07.000Z');

function createChecker(probeOptions: FakeProbesOptions = {}, remote = new FakeRemote()) {
  const config = testConfig({ timing: { ...DEFAULT_CONFIG.timing, livenessAttempts: 3, livenessIntervalMs: 250 } });
  remote.running = true;
  remote.mode = 'privileged';
  const probes = new FakeProbes(remote, { config, ...probeOptions });
  const clock = recordingSleep();
  const checker = new CertificateStabilityChecker({ probes, remote, config, sleep: clock.sleep, now: () => NOW });
  return { checker, probes, remote, sleeps: clock.sleeps };
}

describe('CertificateStabilityChecker', () => {
  it('reads the certificate twice with a settle pause for the session check', async () => {
    const { checker, probes, sleeps } = createChecker();

    const result = await checker.check({ port: 443, mode: 'privileged' }, 'session');

    expect(result).toEqual({
      ok: true,
      value: {
        condition: 'session',
        snapshots: [
          { fingerprint: FINGERPRINT_A, port: 443, capturedAt: NOW.toISOString() },
          { fingerprint: FINGERPRINT_A, port: 443, capturedAt: NOW.toISOString() },
        ],
        restarts: [],
      },
    });
    expect(sleeps).toEqual([3_000]);
    expect(probes.calls).toEqual(['cert 443', 'cert 443']);
  });

  it('reports session drift with both fingerprints', async () => {
    const { checker } = createChecker({ fingerprints: [FINGERPRINT_A, FINGERPRINT_B] });

    const result = await checker.check({ port: 443, mode: 'privileged' }, 'session');

    expect(result).toEqual({
      ok: false,
      error: { kind: 'Drift', condition: 'session', port: 443, first: FINGERPRINT_A, second: FINGERPRINT_B },
    });
  });

  it('restarts in the same mode and waits for liveness and the port before the second read', async () => {
    const { checker, remote, probes } = createChecker();

    const result = await checker.check({ port: 443, mode: 'privileged' }, 'restart');

    expect(result.ok).toBe(true);
    expect(result.ok && result.value.restarts).toEqual(['privileged']);
    expect(remote.calls).toEqual(['restart privileged', 'isRunning']);
    expect(probes.calls).toEqual(['cert 443', 'tcp 443', 'cert 443']);
  });

  it('gives up with RestartTimeout after the configured liveness attempts', async () => {
    const remote = new FakeRemote();
    remote.survivesRestart = false;
    const { checker, sleeps } = createChecker({}, remote);

    const result = await checker.check({ port: 443, mode: 'privileged' }, 'restart');

    expect(result).toEqual({ ok: false, error: { kind: 'RestartTimeout', attempts: 3, intervalMs: 250 } });
    expect(remote.calls.filter((call) => call === 'isRunning')).toHaveLength(3);
    expect(sleeps).toEqual([250, 250]);
  });

  it('maps a failed restart command to RemoteCommandFailure', async () => {
    const remote = new FakeRemote();
    remote.failing.add('restart');
    const { checker } = createChecker({}, remote);

    const result = await checker.check({ port: 443, mode: 'privileged' }, 'restart');

    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'RemoteCommandFailure',
        command: 'restart (privileged)',
        exitCode: 255,
        output: 'ssh: broken pipe',
      },
    });
  });

  it('switches from unprivileged to privileged and back, comparing against the baseline', async () => {
    const remote = new FakeRemote();
    const { checker, probes } = createChecker({}, remote);
    remote.mode = 'unprivileged';

    const result = await checker.check({ port: 9443, mode: 'unprivileged' }, 'mode-switch');

    expect(result.ok).toBe(true);
    expect(result.ok && result.value.restarts).toEqual(['privileged', 'privileged', 'unprivileged']);
    expect(result.ok && result.value.snapshots.map((snapshot) => snapshot.port)).toEqual([
      9443, 443, 443, 443, 443, 443, 9443,
    ]);
    expect(remote.mode).toBe('unprivileged');
    expect(probes.calls.slice(-3)).toEqual(['tcp 443', 'tcp 9443', 'cert 9443']);
  });

  it('fails when the restored service does not come back on its original port', async () => {
    const remote = new FakeRemote();
    const { checker } = createChecker({ openPorts: () => true }, remote);
    remote.mode = 'unprivileged';

    const result = await checker.check({ port: 9443, mode: 'unprivileged' }, 'mode-switch');

    expect(result).toEqual({ ok: false, error: { kind: 'NoListener', host: 'deploy.test', ports: [9443] } });
  });

  it('fails with Drift when the certificate after restoring differs from the baseline', async () => {
    const remote = new FakeRemote();
    const fingerprints = [...Array<string>(6).fill(FINGERPRINT_A), FINGERPRINT_B];
    const { checker } = createChecker({ fingerprints }, remote);
    remote.mode = 'unprivileged';

    const result = await checker.check({ port: 9443, mode: 'unprivileged' }, 'mode-switch');

    expect(result).toEqual({
      ok: false,
      error: { kind: 'Drift', condition: 'mode-switch', port: 9443, first: FINGERPRINT_A, second: FINGERPRINT_B },
    });
  });
});
