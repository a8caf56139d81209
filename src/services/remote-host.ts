import type { RunConfig } from '../config/run-config.js';
import type {
  CommandExecutionResult,
  CommandRunner,
  RemoteHostControl,
  ServiceMode,
} from '../types/verification.js';
import { logThought } from '../utils/logger.js';
import { defaultCommandRunner, shellQuote } from './command-runner.js';

const SSH_OPTIONS = ['-o', 'BatchMode=yes', '-o', 'ConnectTimeout=10'];

export interface RemoteHostOptions {
  commandRunner?: CommandRunner;
  cwd?: string;
}

/**
 * SSH-mediated control of the remote service. The remote side is only ever
 * touched through commands issued here; nothing is cached between calls.
 */
export class RemoteHost implements RemoteHostControl {
  readonly host: string;
  readonly #config: Readonly<RunConfig>;
  readonly #commandRunner: CommandRunner;
  readonly #cwd: string;

  constructor(host: string, config: Readonly<RunConfig>, options: RemoteHostOptions = {}) {
    this.host = host;
    this.#config = config;
    this.#commandRunner = options.commandRunner ?? defaultCommandRunner;
    this.#cwd = options.cwd ?? process.cwd();
  }

  get #login(): string {
    return `${this.#config.target.sshUser}@${this.host}`;
  }

  get #binary(): string {
    return shellQuote(this.#config.service.binaryName);
  }

  /** Always succeeds at the shell level: a missing process is not an error. */
  async stopService(): Promise<CommandExecutionResult> {
    await logThought(`[Remote] Stopping ${this.#config.service.binaryName} on ${this.host}...`);
    return this.#ssh(`pkill ${this.#binary}; sleep 1; pkill -9 ${this.#binary}; true`);
  }

  async prepareDirectories(): Promise<CommandExecutionResult> {
    const root = this.#config.service.certStorageRoot;
    const dirs = ['staging', 'production'].map((mode) => shellQuote(`${root}/${mode}`));
    return this.#ssh(`mkdir -p ${dirs.join(' ')}`);
  }

  async uploadArtifact(localPath: string): Promise<CommandExecutionResult> {
    await logThought(`[Remote] Syncing ${localPath} to ${this.host}...`);
    return this.#commandRunner(`rsync -avz ${shellQuote(localPath)} ${shellQuote(`${this.#login}:`)}`, {
      cwd: this.#cwd,
      timeoutMs: this.#config.timing.remoteCommandTimeoutMs,
    });
  }

  async launch(mode: ServiceMode): Promise<CommandExecutionResult> {
    await logThought(
      `[Remote] Launching ${this.#config.service.binaryName} in ${mode} mode ` +
        `(certificate authority: ${this.#config.certificateAuthority}).`,
    );
    return this.#ssh(
      `pkill ${this.#binary}; chmod +x ${this.#binary}; nohup ${this.launchCommand(mode)} ` +
        `> ${shellQuote(this.#config.service.logFile)} 2>&1 &`,
    );
  }

  async restart(mode: ServiceMode): Promise<CommandExecutionResult> {
    const stopped = await this.stopService();
    if (!stopped.ok) {
      return stopped;
    }
    return this.launch(mode);
  }

  async isRunning(): Promise<boolean> {
    const result = await this.#ssh(`pgrep ${this.#binary} > /dev/null`);
    return result.ok;
  }

  async tailLog(lines: number): Promise<CommandExecutionResult> {
    return this.#ssh(`tail -n ${lines} ${shellQuote(this.#config.service.logFile)}`);
  }

  /** The service invocation without redirection; unprivileged mode shifts the default ports by 9000. */
  launchCommand(mode: ServiceMode): string {
    const { service, certificateAuthority } = this.#config;
    const args = [`./${this.#binary}`, '--root', shellQuote(service.documentRoot)];
    if (certificateAuthority === 'staging') {
      args.push('--staging');
    }
    if (mode === 'unprivileged') {
      args.push(shellQuote(service.unprivilegedFlag));
    }
    args.push(...service.extraFlags.map(shellQuote));
    return args.join(' ');
  }

  #ssh(remoteCommand: string): Promise<CommandExecutionResult> {
    const command = ['ssh', ...SSH_OPTIONS, shellQuote(this.#login), shellQuote(remoteCommand)].join(' ');
    return this.#commandRunner(command, {
      cwd: this.#cwd,
      timeoutMs: this.#config.timing.remoteCommandTimeoutMs,
    });
  }
}
