import { exec } from 'node:child_process';
import { promisify } from 'node:util';
import type { CommandExecutionResult, CommandRunOptions } from '../types/verification.js';
import { logSystemCommand, scrubSensitiveText } from '../utils/logger.js';

const execAsync = promisify(exec);
const DEFAULT_TIMEOUT_MS = 60_000;

function isExecError(
  error: unknown,
): error is Error & { code?: number | string | null; killed?: boolean; stdout?: string; stderr?: string } {
  return error instanceof Error;
}

/** Wrap a value for a POSIX shell command line. */
export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Last `lines` lines of command output, or a placeholder when there is none. */
export function summarizeOutput(output: string, lines = 5): string {
  const trimmed = output.trim();
  if (!trimmed) {
    return 'No command output captured.';
  }
  return trimmed.split('\n').slice(-lines).join('\n');
}

export async function defaultCommandRunner(
  command: string,
  options: CommandRunOptions = {},
): Promise<CommandExecutionResult> {
  const startedAt = Date.now();
  const timeout = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  try {
    const { stdout, stderr } = await execAsync(command, {
      cwd: options.cwd,
      timeout,
      windowsHide: true,
      maxBuffer: 10 * 1024 * 1024,
    });
    const output = scrubSensitiveText([stdout, stderr].filter(Boolean).join('\n').trim());
    await logSystemCommand(command, output, 0);
    return {
      ok: true,
      exitCode: 0,
      output,
      durationMs: Date.now() - startedAt,
    };
  } catch (error: unknown) {
    if (!isExecError(error)) {
      throw error;
    }
    const timedOut = error.killed === true && Date.now() - startedAt >= timeout;
    const output = scrubSensitiveText(
      [error.stdout, error.stderr, timedOut ? `Command timed out after ${timeout}ms.` : error.message]
        .filter((part): part is string => typeof part === 'string' && part.length > 0)
        .join('\n')
        .trim(),
    );
    const exitCode = typeof error.code === 'number' ? error.code : 1;
    await logSystemCommand(command, output, exitCode);
    return {
      ok: false,
      exitCode,
      output,
      durationMs: Date.now() - startedAt,
    };
  }
}
