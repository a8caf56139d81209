import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import type { RunConfig } from '../config/run-config.js';
import type { BuildArtifact, BuildCheckResult, CommandRunner, ProbeResult } from '../types/verification.js';
import { fail, ok } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';
import { defaultCommandRunner, summarizeOutput } from './command-runner.js';

export interface BuildControllerOptions {
  workspaceRoot?: string;
  commandRunner?: CommandRunner;
}

interface NewestFile {
  path: string;
  mtimeMs: number;
}

async function modifiedAt(targetPath: string): Promise<number | null> {
  try {
    return (await stat(targetPath)).mtimeMs;
  } catch {
    return null;
  }
}

async function newestFileUnder(dir: string): Promise<NewestFile | null> {
  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  let newest: NewestFile | null = null;
  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    let candidate: NewestFile | null = null;
    if (entry.isDirectory()) {
      candidate = await newestFileUnder(entryPath);
    } else if (entry.isFile()) {
      const mtimeMs = await modifiedAt(entryPath);
      candidate = mtimeMs === null ? null : { path: entryPath, mtimeMs };
    }
    if (candidate && (!newest || candidate.mtimeMs > newest.mtimeMs)) {
      newest = candidate;
    }
  }
  return newest;
}

/**
 * Rebuilds the service binary only when it is missing or older than a tracked
 * source file.
 */
export class BuildController {
  readonly #config: Readonly<RunConfig>;
  readonly #workspaceRoot: string;
  readonly #commandRunner: CommandRunner;

  constructor(config: Readonly<RunConfig>, options: BuildControllerOptions = {}) {
    this.#config = config;
    this.#workspaceRoot = options.workspaceRoot ?? process.cwd();
    this.#commandRunner = options.commandRunner ?? defaultCommandRunner;
  }

  get artifactPath(): string {
    return path.resolve(this.#workspaceRoot, this.#config.build.artifactPath);
  }

  async newestSource(): Promise<NewestFile | null> {
    let newest: NewestFile | null = null;
    for (const dir of this.#config.build.sourceDirs) {
      const candidate = await newestFileUnder(path.resolve(this.#workspaceRoot, dir));
      if (candidate && (!newest || candidate.mtimeMs > newest.mtimeMs)) {
        newest = candidate;
      }
    }
    return newest;
  }

  async isStale(): Promise<boolean> {
    const artifactMtime = await modifiedAt(this.artifactPath);
    if (artifactMtime === null) {
      return true;
    }
    const newest = await this.newestSource();
    return newest !== null && newest.mtimeMs > artifactMtime;
  }

  async ensureFresh(): Promise<ProbeResult<BuildCheckResult>> {
    const newest = await this.newestSource();
    const stale = await this.isStale();
    const newestSource = newest ? path.relative(this.#workspaceRoot, newest.path) : null;

    if (!stale) {
      await logThought(`[Build] ${this.#config.build.artifactPath} is up to date.`);
      return ok({ rebuilt: false, artifact: await this.#artifact(), newestSource });
    }

    await logThought(
      `[Build] Building profile '${this.#config.build.profile}'` +
        (newestSource ? ` (newer source: ${newestSource})...` : '...'),
    );
    const run = await this.#commandRunner(this.#config.build.command, {
      cwd: this.#workspaceRoot,
      timeoutMs: this.#config.build.timeoutMs,
    });
    if (!run.ok) {
      return fail({ kind: 'BuildFailure', exitCode: run.exitCode, output: summarizeOutput(run.output, 20) });
    }

    const artifact = await this.#artifact();
    if (artifact.modifiedAt === null) {
      return fail({
        kind: 'BuildFailure',
        exitCode: 0,
        output: `Build succeeded but ${this.#config.build.artifactPath} was not produced.`,
      });
    }
    await logThought(`[Build] Build completed in ${run.durationMs}ms.`);
    return ok({ rebuilt: true, artifact, newestSource });
  }

  async #artifact(): Promise<BuildArtifact> {
    const mtimeMs = await modifiedAt(this.artifactPath);
    return {
      path: this.artifactPath,
      profile: this.#config.build.profile,
      modifiedAt: mtimeMs === null ? null : new Date(mtimeMs).toISOString(),
    };
  }
}
