import type { RunConfig } from '../config/run-config.js';
import { portCandidates } from '../config/run-config.js';
import type {
  DetectedListener,
  FingerprintSnapshot,
  ProbeResult,
  ProbeSuite,
  RemoteHostControl,
  ServiceMode,
  StabilityCondition,
} from '../types/verification.js';
import { fail, ok } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';
import { sleep as defaultSleep, withRetry, type Sleeper } from '../utils/retry.js';
import { detectHttpsPort } from './port-detector.js';

export interface StabilityReport {
  condition: StabilityCondition;
  snapshots: FingerprintSnapshot[];
  /** Modes the service was relaunched in, in order. */
  restarts: ServiceMode[];
}

export interface CertificateStabilityCheckerOptions {
  probes: ProbeSuite;
  remote: RemoteHostControl;
  config: Readonly<RunConfig>;
  sleep?: Sleeper;
  now?: () => Date;
}

function alternateMode(mode: ServiceMode): ServiceMode {
  return mode === 'privileged' ? 'unprivileged' : 'privileged';
}

/**
 * Proves the served certificate does not change across repeated requests, a
 * same-mode restart, or a privilege-mode switch. Any mismatch is a `Drift`
 * failure and is never retried.
 */
export class CertificateStabilityChecker {
  readonly #probes: ProbeSuite;
  readonly #remote: RemoteHostControl;
  readonly #config: Readonly<RunConfig>;
  readonly #sleep: Sleeper;
  readonly #now: () => Date;

  constructor(options: CertificateStabilityCheckerOptions) {
    this.#probes = options.probes;
    this.#remote = options.remote;
    this.#config = options.config;
    this.#sleep = options.sleep ?? defaultSleep;
    this.#now = options.now ?? (() => new Date());
  }

  async check(listener: DetectedListener, condition: StabilityCondition): Promise<ProbeResult<StabilityReport>> {
    switch (condition) {
      case 'session':
        return this.#checkSession(listener.port);
      case 'restart':
        return this.#checkRestart(listener);
      case 'mode-switch':
        return this.#checkModeSwitch(listener);
    }
  }

  async capture(port: number): Promise<ProbeResult<FingerprintSnapshot>> {
    const result = await this.#probes.fetchCertFingerprint(
      this.#remote.host,
      port,
      this.#config.timing.fingerprintTimeoutMs,
    );
    if (!result.ok) {
      return result;
    }
    return ok(
      Object.freeze({
        fingerprint: result.value,
        port,
        capturedAt: this.#now().toISOString(),
      }),
    );
  }

  /** Poll process liveness with a fixed interval; exhausting the attempts is a `RestartTimeout`. */
  async waitForLiveness(): Promise<ProbeResult<number>> {
    const { livenessAttempts, livenessIntervalMs } = this.#config.timing;
    const polled = await withRetry(
      async () => {
        if (!(await this.#remote.isRunning())) {
          throw new Error(`${this.#config.service.binaryName} is not running`);
        }
      },
      {
        maxAttempts: livenessAttempts,
        baseDelayMs: livenessIntervalMs,
        backoffFactor: 1,
        label: 'liveness',
        sleep: this.#sleep,
      },
    );
    return polled.ok
      ? ok(polled.attempts)
      : fail({ kind: 'RestartTimeout', attempts: livenessAttempts, intervalMs: livenessIntervalMs });
  }

  /** Wait until `port` accepts TCP again, with the same bound as the liveness poll. */
  async waitForPort(port: number): Promise<ProbeResult<number>> {
    const { livenessAttempts, livenessIntervalMs, tcpTimeoutMs } = this.#config.timing;
    const polled = await withRetry(
      async () => {
        if (!(await this.#probes.tcpReachable(this.#remote.host, port, tcpTimeoutMs))) {
          throw new Error(`port ${port} is not accepting connections`);
        }
      },
      {
        maxAttempts: livenessAttempts,
        baseDelayMs: livenessIntervalMs,
        backoffFactor: 1,
        label: `port:${port}`,
        sleep: this.#sleep,
      },
    );
    return polled.ok
      ? ok(polled.attempts)
      : fail({ kind: 'RestartTimeout', attempts: livenessAttempts, intervalMs: livenessIntervalMs });
  }

  #compare(
    condition: StabilityCondition,
    first: FingerprintSnapshot,
    second: FingerprintSnapshot,
  ): ProbeResult<void> {
    if (first.fingerprint !== second.fingerprint) {
      return fail({
        kind: 'Drift',
        condition,
        port: second.port,
        first: first.fingerprint,
        second: second.fingerprint,
      });
    }
    return ok(undefined);
  }

  async #checkSession(port: number): Promise<ProbeResult<StabilityReport>> {
    const first = await this.capture(port);
    if (!first.ok) return first;
    await this.#sleep(this.#config.timing.sessionSettleMs);
    const second = await this.capture(port);
    if (!second.ok) return second;

    const compared = this.#compare('session', first.value, second.value);
    if (!compared.ok) return compared;
    await logThought(`[Stability] Same certificate on repeated requests to port ${port}.`);
    return ok({ condition: 'session', snapshots: [first.value, second.value], restarts: [] });
  }

  async #relaunch(mode: ServiceMode, port: number): Promise<ProbeResult<void>> {
    const restarted = await this.#remote.restart(mode);
    if (!restarted.ok) {
      return fail({
        kind: 'RemoteCommandFailure',
        command: `restart (${mode})`,
        exitCode: restarted.exitCode,
        output: restarted.output,
      });
    }
    const live = await this.waitForLiveness();
    if (!live.ok) return live;
    const listening = await this.waitForPort(port);
    if (!listening.ok) return listening;
    return ok(undefined);
  }

  async #checkRestart(listener: DetectedListener): Promise<ProbeResult<StabilityReport>> {
    const before = await this.capture(listener.port);
    if (!before.ok) return before;

    await logThought(`[Stability] Restarting service in ${listener.mode} mode...`);
    const relaunched = await this.#relaunch(listener.mode, listener.port);
    if (!relaunched.ok) return relaunched;

    const after = await this.capture(listener.port);
    if (!after.ok) return after;

    const compared = this.#compare('restart', before.value, after.value);
    if (!compared.ok) return compared;
    await logThought(`[Stability] Certificate survived a restart on port ${listener.port}.`);
    return ok({ condition: 'restart', snapshots: [before.value, after.value], restarts: [listener.mode] });
  }

  async #checkModeSwitch(original: DetectedListener): Promise<ProbeResult<StabilityReport>> {
    const candidates = portCandidates(this.#config);
    const mode = alternateMode(original.mode);
    const alternate = candidates.find((candidate) => candidate.mode === mode);
    if (!alternate) {
      return fail({ kind: 'NoListener', host: this.#remote.host, ports: [] });
    }

    const snapshots: FingerprintSnapshot[] = [];
    const restarts: ServiceMode[] = [];

    const baseline = await this.capture(original.port);
    if (!baseline.ok) return baseline;
    snapshots.push(baseline.value);

    await logThought(`[Stability] Switching service to ${mode} mode (port ${alternate.port})...`);
    const switched = await this.#relaunch(mode, alternate.port);
    if (!switched.ok) return switched;
    restarts.push(mode);

    const switchedSnapshot = await this.capture(alternate.port);
    if (!switchedSnapshot.ok) return switchedSnapshot;
    snapshots.push(switchedSnapshot.value);
    const acrossSwitch = this.#compare('mode-switch', baseline.value, switchedSnapshot.value);
    if (!acrossSwitch.ok) return acrossSwitch;

    const session = await this.#checkSession(alternate.port);
    if (!session.ok) return session;
    snapshots.push(...session.value.snapshots);

    const restart = await this.#checkRestart(alternate);
    if (!restart.ok) return restart;
    snapshots.push(...restart.value.snapshots);
    restarts.push(...restart.value.restarts);

    await logThought(`[Stability] Restoring ${original.mode} mode (port ${original.port})...`);
    const restored = await this.#relaunch(original.mode, original.port);
    if (!restored.ok) return restored;
    restarts.push(original.mode);

    const detected = await detectHttpsPort(this.#remote.host, this.#probes, candidates, this.#config.timing.tcpTimeoutMs);
    if (!detected.ok) return detected;
    if (detected.value.port !== original.port || detected.value.mode !== original.mode) {
      return fail({ kind: 'NoListener', host: this.#remote.host, ports: [original.port] });
    }

    const restoredSnapshot = await this.capture(original.port);
    if (!restoredSnapshot.ok) return restoredSnapshot;
    snapshots.push(restoredSnapshot.value);
    const afterRestore = this.#compare('mode-switch', baseline.value, restoredSnapshot.value);
    if (!afterRestore.ok) return afterRestore;

    await logThought(`[Stability] Certificate unchanged across ${original.mode} → ${mode} → ${original.mode}.`);
    return ok({ condition: 'mode-switch', snapshots, restarts });
  }
}
