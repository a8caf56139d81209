export type ServiceMode = 'privileged' | 'unprivileged';

export type CertificateAuthorityMode = 'staging' | 'production';

export type StabilityCondition = 'session' | 'restart' | 'mode-switch';

export type StageId =
  | 'BUILD_CHECK'
  | 'DEPLOY'
  | 'PORT_PROBE'
  | 'HTTP_CHECK'
  | 'HTTPS_CHECK'
  | 'SESSION_CERT_STABLE'
  | 'RESTART_CERT_STABLE'
  | 'CONTENT_CHECK'
  | 'MODE_SWITCH_CERT_STABLE'
  | 'TEARDOWN_DECISION';

export type StageOutcomeStatus = 'passed' | 'failed' | 'skipped';

export type VerificationError =
  | { kind: 'BuildFailure'; exitCode: number; output: string }
  | { kind: 'Unreachable'; target: string; reason: string }
  | { kind: 'Timeout'; target: string; timeoutMs: number }
  | { kind: 'NoListener'; host: string; ports: number[] }
  | { kind: 'ProtocolFailure'; url: string; primary: string; fallback: string }
  | { kind: 'NoCertificate'; host: string; port: number }
  | { kind: 'Drift'; condition: StabilityCondition; port: number; first: string; second: string }
  | { kind: 'ContentInvalid'; reason: 'empty' | 'not_html'; preview: string }
  | { kind: 'ContentInvalid'; reason: 'http_status'; statusCode: number; preview: string }
  | { kind: 'RestartTimeout'; attempts: number; intervalMs: number }
  | { kind: 'RemoteCommandFailure'; command: string; exitCode: number; output: string }
  | { kind: 'ConfigInvalid'; errors: string[] }
  | { kind: 'InternalError'; message: string };

export type VerificationErrorKind = VerificationError['kind'];

export type ProbeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: VerificationError; transcript?: string };

export interface HttpResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
  /** Curl-like narration of the attempt, kept for failure diagnostics. */
  transcript: string;
}

export interface HttpGetOptions {
  connectTimeoutMs: number;
  maxTimeMs: number;
}

export type TlsVersion = 'TLSv1.2' | 'TLSv1.3';

export interface HttpsGetOptions extends HttpGetOptions {
  tlsMin: TlsVersion;
  tlsMax: TlsVersion;
  /** OpenSSL cipher list; omitted means the runtime default. */
  ciphers?: string;
  verifyPeer: boolean;
  retryCount: number;
  retryDelayMs: number;
}

export interface ProbeSuite {
  tcpReachable(host: string, port: number, timeoutMs: number): Promise<boolean>;
  httpGet(url: string, options: HttpGetOptions): Promise<ProbeResult<HttpResponse>>;
  httpsGet(url: string, options: HttpsGetOptions): Promise<ProbeResult<HttpResponse>>;
  fetchCertFingerprint(host: string, port: number, timeoutMs: number): Promise<ProbeResult<string>>;
}

export interface PortCandidate {
  port: number;
  mode: ServiceMode;
}

export interface DetectedListener {
  port: number;
  mode: ServiceMode;
}

export interface FingerprintSnapshot {
  readonly fingerprint: string;
  readonly port: number;
  readonly capturedAt: string;
}

export interface CommandExecutionResult {
  ok: boolean;
  exitCode: number;
  output: string;
  durationMs: number;
}

export interface CommandRunOptions {
  cwd?: string;
  timeoutMs?: number;
}

export type CommandRunner = (command: string, options?: CommandRunOptions) => Promise<CommandExecutionResult>;

export interface RemoteHostControl {
  readonly host: string;
  stopService(): Promise<CommandExecutionResult>;
  prepareDirectories(): Promise<CommandExecutionResult>;
  uploadArtifact(localPath: string): Promise<CommandExecutionResult>;
  launch(mode: ServiceMode): Promise<CommandExecutionResult>;
  restart(mode: ServiceMode): Promise<CommandExecutionResult>;
  isRunning(): Promise<boolean>;
  tailLog(lines: number): Promise<CommandExecutionResult>;
}

export interface BuildArtifact {
  path: string;
  profile: string;
  modifiedAt: string | null;
}

export interface BuildCheckResult {
  rebuilt: boolean;
  artifact: BuildArtifact;
  newestSource: string | null;
}

export interface DeploymentSession {
  mode: ServiceMode;
  startedAt: string;
  stoppedAt?: string;
}

export interface StageResult {
  stage: StageId;
  outcome: StageOutcomeStatus;
  detail: string;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  error?: VerificationError;
  /** Raw output kept for the failure report (for example a fallback transcript). */
  diagnostic?: string;
}

export type PipelineRunStatus = 'passed' | 'failed';

export interface PipelineRun {
  runId: string;
  target: string;
  quitAfter: boolean;
  startedAt: string;
  completedAt: string;
  status: PipelineRunStatus;
  artifact: BuildArtifact | null;
  listener: DetectedListener | null;
  sessions: DeploymentSession[];
  stages: StageResult[];
  failedStage: StageId | null;
  error: VerificationError | null;
  logTail: string | null;
  reportPath?: string;
}
