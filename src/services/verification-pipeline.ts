import { randomUUID } from 'node:crypto';
import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import net from 'node:net';
import path from 'node:path';
import type { RunConfig } from '../config/run-config.js';
import { portCandidates } from '../config/run-config.js';
import type {
  BuildArtifact,
  BuildCheckResult,
  CommandExecutionResult,
  CommandRunner,
  DeploymentSession,
  DetectedListener,
  HttpsGetOptions,
  PipelineRun,
  ProbeResult,
  ProbeSuite,
  RemoteHostControl,
  ServiceMode,
  StabilityCondition,
  StageId,
  StageResult,
  VerificationError,
} from '../types/verification.js';
import { describeError, safeError } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';
import { sleep as defaultSleep, type Sleeper } from '../utils/retry.js';
import { BuildController } from './build-controller.js';
import { CertificateStabilityChecker, type StabilityReport } from './cert-stability.js';
import { DiagnosticReporter } from './diagnostic-reporter.js';
import { detectHttpsPort } from './port-detector.js';
import { createProbeSuite } from './probes.js';
import { RemoteHost } from './remote-host.js';

export const PRIMARY_TLS_OPTIONS: HttpsGetOptions = {
  tlsMin: 'TLSv1.2',
  tlsMax: 'TLSv1.3',
  // TLS 1.2 suites; the TLS_* entries keep TLS 1.3 negotiable.
  ciphers:
    'TLS_AES_256_GCM_SHA384:TLS_CHACHA20_POLY1305_SHA256:TLS_AES_128_GCM_SHA256:' +
    'ECDHE+AESGCM:ECDHE+CHACHA20:DHE+AESGCM:DHE+CHACHA20:!aNULL:!MD5:!DSS',
  verifyPeer: false,
  retryCount: 2,
  retryDelayMs: 1_000,
  connectTimeoutMs: 10_000,
  maxTimeMs: 15_000,
};

export const FALLBACK_TLS_OPTIONS: HttpsGetOptions = {
  tlsMin: 'TLSv1.2',
  tlsMax: 'TLSv1.3',
  verifyPeer: false,
  retryCount: 1,
  retryDelayMs: 1_000,
  connectTimeoutMs: 10_000,
  maxTimeMs: 15_000,
};

export const CONTENT_TLS_OPTIONS: HttpsGetOptions = {
  tlsMin: 'TLSv1.2',
  tlsMax: 'TLSv1.3',
  verifyPeer: false,
  retryCount: 0,
  retryDelayMs: 0,
  connectTimeoutMs: 15_000,
  maxTimeMs: 15_000,
};

const HTTP_TIMEOUTS = { connectTimeoutMs: 5_000, maxTimeMs: 10_000 };
const HTML_MARKER = /<html|<!DOCTYPE/i;

export interface ArtifactBuilder {
  ensureFresh(): Promise<ProbeResult<BuildCheckResult>>;
}

export interface VerificationPipelineOptions {
  config: Readonly<RunConfig>;
  target: string;
  quitAfter?: boolean;
  workspaceRoot?: string;
  commandRunner?: CommandRunner;
  probes?: ProbeSuite;
  remote?: RemoteHostControl;
  builder?: ArtifactBuilder;
  sleep?: Sleeper;
  now?: () => Date;
  /** Write the run record under `config.reports.dir`. @default true */
  persistReport?: boolean;
}

type StageOutcome =
  | { status: 'passed' | 'skipped'; detail: string; diagnostic?: string }
  | { status: 'failed'; error: VerificationError; detail?: string; diagnostic?: string };

interface RunContext {
  artifact: BuildArtifact | null;
  listener: DetectedListener | null;
  sessions: DeploymentSession[];
}

interface StageDefinition {
  id: StageId;
  /** Failures capture the remote log tail; false only before anything is deployed. */
  captureDiagnostics: boolean;
  /** Pause `timing.stageGapMs` before running. */
  gapBefore?: boolean;
  run: (context: RunContext) => Promise<StageOutcome>;
}

function nowIso(now: () => Date): string {
  return now().toISOString();
}

/** `YYYYMMDDhhmmssSSS` */
function compactTimestamp(now: () => Date): string {
  return now().toISOString().replace(/[-:.TZ]/g, '').slice(0, 17);
}

function hostForUrl(host: string): string {
  return net.isIPv6(host) ? `[${host}]` : host;
}

function passed(detail: string, diagnostic?: string): StageOutcome {
  return { status: 'passed', detail, diagnostic };
}

function failed(error: VerificationError, diagnostic?: string): StageOutcome {
  return { status: 'failed', error, diagnostic };
}

function commandFailure(command: string, result: CommandExecutionResult): StageOutcome {
  return failed({ kind: 'RemoteCommandFailure', command, exitCode: result.exitCode, output: result.output });
}

/**
 * Linear release verification for one remote host.
 *
 * Stages run strictly in order and the first failure ends the run. Every
 * failure after the build step fetches the remote log tail exactly once;
 * a passing run never does.
 */
export class VerificationPipelineService {
  readonly #config: Readonly<RunConfig>;
  readonly #target: string;
  readonly #quitAfter: boolean;
  readonly #workspaceRoot: string;
  readonly #probes: ProbeSuite;
  readonly #remote: RemoteHostControl;
  readonly #builder: ArtifactBuilder;
  readonly #checker: CertificateStabilityChecker;
  readonly #reporter: DiagnosticReporter;
  readonly #sleep: Sleeper;
  readonly #now: () => Date;
  readonly #persistReport: boolean;

  constructor(options: VerificationPipelineOptions) {
    this.#config = options.config;
    this.#target = options.target;
    this.#quitAfter = options.quitAfter ?? false;
    this.#workspaceRoot = options.workspaceRoot ?? process.cwd();
    this.#sleep = options.sleep ?? defaultSleep;
    this.#now = options.now ?? (() => new Date());
    this.#probes = options.probes ?? createProbeSuite(this.#sleep);
    this.#remote =
      options.remote ??
      new RemoteHost(options.target, options.config, {
        commandRunner: options.commandRunner,
        cwd: this.#workspaceRoot,
      });
    this.#builder =
      options.builder ??
      new BuildController(options.config, {
        workspaceRoot: this.#workspaceRoot,
        commandRunner: options.commandRunner,
      });
    this.#checker = new CertificateStabilityChecker({
      probes: this.#probes,
      remote: this.#remote,
      config: options.config,
      sleep: this.#sleep,
      now: this.#now,
    });
    this.#reporter = new DiagnosticReporter(this.#remote);
    this.#persistReport = options.persistReport ?? true;
  }

  /** Number of remote log captures so far (0 or 1). */
  get diagnosticCaptures(): number {
    return this.#reporter.captureCount;
  }

  async run(): Promise<PipelineRun> {
    const startedAt = nowIso(this.#now);
    const runId = `run_${compactTimestamp(this.#now)}_${randomUUID().slice(0, 6)}`;
    const context: RunContext = { artifact: null, listener: null, sessions: [] };
    const stages: StageResult[] = [];
    let failure: StageResult | null = null;
    let logTail: string | null = null;

    await logThought(
      `[Pipeline] Verifying ${this.#target} (${this.#quitAfter ? 'quit after tests' : 'keep alive'}, ` +
        `certificate authority: ${this.#config.certificateAuthority}).`,
    );

    for (const stage of this.#stages()) {
      if (stage.gapBefore) {
        await this.#sleep(this.#config.timing.stageGapMs);
      }
      const result = await this.#execute(stage, context);
      stages.push(result);
      if (result.outcome === 'failed') {
        failure = result;
        if (stage.captureDiagnostics) {
          logTail = await this.#reporter.captureLogTail(this.#config.diagnostics.failureTailLines);
        }
        break;
      }
    }

    const run: PipelineRun = {
      runId,
      target: this.#target,
      quitAfter: this.#quitAfter,
      startedAt,
      completedAt: nowIso(this.#now),
      status: failure ? 'failed' : 'passed',
      artifact: context.artifact,
      listener: context.listener,
      sessions: context.sessions,
      stages,
      failedStage: failure?.stage ?? null,
      error: failure?.error ?? null,
      logTail,
    };

    if (this.#persistReport) {
      try {
        run.reportPath = await this.#writeReport(run);
      } catch (error: unknown) {
        console.error(`[Pipeline] Failed to write run record: ${safeError(error)}`);
      }
    }
    await logThought(
      failure
        ? `[Pipeline] FAILED at ${failure.stage}: ${failure.detail}`
        : '[Pipeline] All stages passed.',
    );
    return run;
  }

  #stages(): StageDefinition[] {
    return [
      { id: 'BUILD_CHECK', captureDiagnostics: false, run: (context) => this.#buildCheck(context) },
      { id: 'DEPLOY', captureDiagnostics: true, run: (context) => this.#deploy(context) },
      { id: 'PORT_PROBE', captureDiagnostics: true, run: (context) => this.#portProbe(context) },
      { id: 'HTTP_CHECK', captureDiagnostics: true, run: () => this.#httpCheck() },
      { id: 'HTTPS_CHECK', captureDiagnostics: true, gapBefore: true, run: (context) => this.#httpsCheck(context) },
      {
        id: 'SESSION_CERT_STABLE',
        captureDiagnostics: true,
        gapBefore: true,
        run: (context) => this.#stability(context, 'session'),
      },
      { id: 'RESTART_CERT_STABLE', captureDiagnostics: true, run: (context) => this.#stability(context, 'restart') },
      { id: 'CONTENT_CHECK', captureDiagnostics: true, run: (context) => this.#contentCheck(context) },
      {
        id: 'MODE_SWITCH_CERT_STABLE',
        captureDiagnostics: true,
        run: (context) => this.#stability(context, 'mode-switch'),
      },
      { id: 'TEARDOWN_DECISION', captureDiagnostics: true, run: (context) => this.#teardown(context) },
    ];
  }

  async #execute(stage: StageDefinition, context: RunContext): Promise<StageResult> {
    const started = Date.now();
    const startedAt = nowIso(this.#now);
    await logThought(`[Pipeline] === ${stage.id} ===`);

    let outcome: StageOutcome;
    try {
      outcome = await stage.run(context);
    } catch (error: unknown) {
      outcome = failed({ kind: 'InternalError', message: safeError(error) });
    }

    const base = {
      stage: stage.id,
      startedAt,
      completedAt: nowIso(this.#now),
      durationMs: Date.now() - started,
      diagnostic: outcome.diagnostic,
    };
    if (outcome.status === 'failed') {
      const detail = outcome.detail ?? describeError(outcome.error);
      await logThought(`[Pipeline] ✗ ${stage.id}: ${detail}`);
      return { ...base, outcome: 'failed', detail, error: outcome.error };
    }
    await logThought(`[Pipeline] ${outcome.status === 'skipped' ? '-' : '✓'} ${stage.id}: ${outcome.detail}`);
    return { ...base, outcome: outcome.status, detail: outcome.detail };
  }

  #startSession(context: RunContext, mode: ServiceMode): void {
    const at = nowIso(this.#now);
    const current = context.sessions.at(-1);
    if (current && !current.stoppedAt) {
      current.stoppedAt = at;
    }
    context.sessions.push({ mode, startedAt: at });
  }

  async #buildCheck(context: RunContext): Promise<StageOutcome> {
    const result = await this.#builder.ensureFresh();
    if (!result.ok) {
      return failed(result.error, result.error.kind === 'BuildFailure' ? result.error.output : undefined);
    }
    context.artifact = result.value.artifact;
    return passed(
      result.value.rebuilt
        ? `Rebuilt ${result.value.artifact.path} (profile ${result.value.artifact.profile}).`
        : `${result.value.artifact.path} is newer than every tracked source file.`,
    );
  }

  async #deploy(context: RunContext): Promise<StageOutcome> {
    const { service, timing, diagnostics } = this.#config;
    if (!context.artifact) {
      return failed({ kind: 'InternalError', message: 'No build artifact to deploy.' });
    }

    const stopped = await this.#remote.stopService();
    if (!stopped.ok) return commandFailure('stop service', stopped);

    const prepared = await this.#remote.prepareDirectories();
    if (!prepared.ok) return commandFailure('prepare certificate directories', prepared);

    const uploaded = await this.#remote.uploadArtifact(context.artifact.path);
    if (!uploaded.ok) return commandFailure(`upload ${context.artifact.path}`, uploaded);

    const launched = await this.#remote.launch(service.launchMode);
    if (!launched.ok) return commandFailure(`launch (${service.launchMode})`, launched);
    this.#startSession(context, service.launchMode);

    await logThought(`[Pipeline] Waiting ${timing.startupSettleMs}ms for the server to initialize...`);
    await this.#sleep(timing.startupSettleMs);

    if (!(await this.#remote.isRunning())) {
      return failed({ kind: 'RestartTimeout', attempts: 1, intervalMs: timing.startupSettleMs });
    }

    let startupLog: string | undefined;
    if (diagnostics.startupTailLines > 0) {
      const tail = await this.#remote.tailLog(diagnostics.startupTailLines);
      startupLog = tail.output.trim() || undefined;
      if (startupLog) {
        await logThought(`[Remote] Startup log:\n${startupLog}`);
      }
    }

    const openPorts: string[] = [];
    for (const port of [this.#config.ports.http, this.#config.ports.privileged]) {
      const open = await this.#probes.tcpReachable(this.#target, port, timing.tcpTimeoutMs);
      openPorts.push(`${port} ${open ? 'open' : 'closed'}`);
      if (!open) {
        await logThought(`[Probe] WARNING - port ${port} is not accessible.`);
      }
    }

    return passed(
      `${service.binaryName} is running in ${service.launchMode} mode (ports: ${openPorts.join(', ')}).`,
      startupLog,
    );
  }

  async #portProbe(context: RunContext): Promise<StageOutcome> {
    const detected = await detectHttpsPort(
      this.#target,
      this.#probes,
      portCandidates(this.#config),
      this.#config.timing.tcpTimeoutMs,
    );
    if (!detected.ok) return failed(detected.error);
    context.listener = detected.value;
    return passed(`HTTPS listener on port ${detected.value.port} (${detected.value.mode} mode).`);
  }

  async #httpCheck(): Promise<StageOutcome> {
    const url = `http://${hostForUrl(this.#target)}:${this.#config.ports.http}/`;
    const result = await this.#probes.httpGet(url, HTTP_TIMEOUTS);
    if (!result.ok) return failed(result.error, result.transcript);
    return passed(`GET ${url} answered HTTP ${result.value.statusCode}.`);
  }

  #httpsUrl(context: RunContext): string {
    const port = context.listener?.port ?? this.#config.ports.privileged;
    return `https://${hostForUrl(this.#target)}:${port}/`;
  }

  async #httpsCheck(context: RunContext): Promise<StageOutcome> {
    const url = this.#httpsUrl(context);
    const primary = await this.#probes.httpsGet(url, PRIMARY_TLS_OPTIONS);
    if (primary.ok) {
      return passed(`GET ${url} answered HTTP ${primary.value.statusCode}.`);
    }

    await logThought(`[Probe] HTTPS failed (${describeError(primary.error)}); retrying with fallback TLS options...`);
    const fallback = await this.#probes.httpsGet(url, FALLBACK_TLS_OPTIONS);
    if (fallback.ok) {
      return passed(
        `GET ${url} answered HTTP ${fallback.value.statusCode} with fallback TLS options.`,
        fallback.value.transcript,
      );
    }
    return failed(
      {
        kind: 'ProtocolFailure',
        url,
        primary: describeError(primary.error),
        fallback: describeError(fallback.error),
      },
      fallback.transcript ?? '',
    );
  }

  async #stability(context: RunContext, condition: StabilityCondition): Promise<StageOutcome> {
    const listener = context.listener;
    if (!listener) {
      return failed({ kind: 'InternalError', message: 'No HTTPS listener was detected.' });
    }
    if (condition === 'mode-switch' && listener.mode !== 'unprivileged') {
      return { status: 'skipped', detail: `Service runs in ${listener.mode} mode; no mode switch needed.` };
    }

    const result = await this.#checker.check(listener, condition);
    if (!result.ok) return failed(result.error);
    this.#recordRestarts(context, result.value);
    const fingerprint = result.value.snapshots[0]?.fingerprint ?? 'unknown';
    return passed(`Certificate ${fingerprint} stable (${condition}, ${result.value.snapshots.length} reads).`);
  }

  #recordRestarts(context: RunContext, report: StabilityReport): void {
    for (const mode of report.restarts) {
      this.#startSession(context, mode);
    }
  }

  async #contentCheck(context: RunContext): Promise<StageOutcome> {
    const url = this.#httpsUrl(context);
    const result = await this.#probes.httpsGet(url, CONTENT_TLS_OPTIONS);
    if (!result.ok) return failed(result.error, result.transcript);

    const { body, statusCode } = result.value;
    const preview = body.split('\n').slice(0, this.#config.diagnostics.bodyPreviewLines).join('\n');
    if (statusCode >= 400) {
      return failed({ kind: 'ContentInvalid', reason: 'http_status', statusCode, preview }, result.value.transcript);
    }
    if (body.length === 0) {
      return failed({ kind: 'ContentInvalid', reason: 'empty', preview: '' });
    }
    if (!HTML_MARKER.test(body)) {
      return failed({ kind: 'ContentInvalid', reason: 'not_html', preview });
    }
    return passed(`Received ${body.length} bytes of HTML from ${url}.`);
  }

  async #teardown(context: RunContext): Promise<StageOutcome> {
    if (!this.#quitAfter) {
      return passed('Keepalive mode: leaving the service running.');
    }

    await logThought('[Pipeline] Stopping server process on remote server...');
    const stopped = await this.#remote.stopService();
    if (!stopped.ok) return commandFailure('stop service', stopped);
    if (await this.#remote.isRunning()) {
      return failed({
        kind: 'RemoteCommandFailure',
        command: `pkill ${this.#config.service.binaryName}`,
        exitCode: stopped.exitCode,
        output: 'Service process is still running after teardown.',
      });
    }
    const current = context.sessions.at(-1);
    if (current && !current.stoppedAt) {
      current.stoppedAt = nowIso(this.#now);
    }
    return passed('Quit-after mode: service stopped and confirmed gone.');
  }

  async #writeReport(run: PipelineRun): Promise<string> {
    const reportsDir = path.resolve(this.#workspaceRoot, this.#config.reports.dir);
    const reportPath = path.join(reportsDir, `${run.runId}.json`);
    await mkdir(reportsDir, { recursive: true });
    await writeFile(reportPath, `${JSON.stringify({ ...run, reportPath }, null, 2)}\n`, 'utf8');
    await writeFile(
      path.join(reportsDir, 'latest.json'),
      `${JSON.stringify({ runId: run.runId, reportPath, status: run.status, completedAt: run.completedAt }, null, 2)}\n`,
      'utf8',
    );
    await appendFile(
      path.join(reportsDir, 'runs.log'),
      `${JSON.stringify({
        runId: run.runId,
        target: run.target,
        status: run.status,
        failedStage: run.failedStage,
        completedAt: run.completedAt,
      })}\n`,
      'utf8',
    );
    return reportPath;
  }
}
