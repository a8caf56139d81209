import { ConfigError, loadRunConfig, resolveTarget } from '../config/run-config.js';
import { VerificationPipelineService } from '../services/verification-pipeline.js';
import type { PipelineRun } from '../types/verification.js';
import { describeError } from '../utils/errors.js';
import { formatRunReport } from './report-format.js';

export const QUIT_AFTER_TOKEN = 'quitafter';

export interface ParsedArgs {
  quitAfter: boolean;
  host?: string;
  configPath?: string;
  help: boolean;
  /** Set when the arguments cannot be used as given. */
  usageError?: string;
}

/**
 * `[quitafter] [host]`, plus `--config <path>` and `--help` anywhere.
 * `quitafter` only counts as the first positional token.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { quitAfter: false, help: false };
  const positionals: string[] = [];

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    const next = argv[index + 1];
    if (token === '--help' || token === '-h') {
      parsed.help = true;
      continue;
    }
    if (token === '--config') {
      if (!next || next.startsWith('-')) {
        parsed.usageError = '--config requires a file path.';
        continue;
      }
      parsed.configPath = next;
      index += 1;
      continue;
    }
    positionals.push(token);
  }

  if (positionals[0] === QUIT_AFTER_TOKEN) {
    parsed.quitAfter = true;
    positionals.shift();
  }
  parsed.host = positionals[0];
  return parsed;
}

export function printUsage(): void {
  console.error(
    [
      'Usage:',
      '  tsx src/release/cli.ts [quitafter] [host] [--config <path>]',
      '',
      'Builds if stale, deploys to <host> (default: first line of .remote), and verifies',
      'HTTP, HTTPS and certificate stability. With quitafter the service is stopped at the end.',
    ].join('\n'),
  );
}

export function exitCodeFor(run: PipelineRun): number {
  return run.status === 'passed' ? 0 : 1;
}

export async function runVerifyCommand(argv: string[] = process.argv.slice(2)): Promise<number> {
  const parsed = parseArgs(argv);
  if (parsed.help) {
    printUsage();
    return 0;
  }
  if (parsed.usageError) {
    console.error(`[Usage] ${parsed.usageError}`);
    printUsage();
    return 1;
  }

  let service: VerificationPipelineService;
  try {
    const config = await loadRunConfig(parsed.configPath);
    const target = await resolveTarget(config, parsed.host);
    service = new VerificationPipelineService({ config, target, quitAfter: parsed.quitAfter });
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      console.error(`[Config] ${describeError({ kind: 'ConfigInvalid', errors: error.errors })}`);
      return 1;
    }
    throw error;
  }

  const run = await service.run();
  console.log(formatRunReport(run));
  return exitCodeFor(run);
}
