import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

const SENSITIVE_ENV_PATTERN = /(SECRET|TOKEN|PASSWORD|PASSWD|API_KEY|PRIVATE_KEY)/i;
const KEY_VALUE_PATTERN =
  /\b([A-Za-z0-9_]*(?:secret|token|password|passwd|api[_-]?key|private[_-]?key)[A-Za-z0-9_]*)\s*[=:]\s*("[^"]*"|'[^']*'|\S+)/gi;
const MIN_SENSITIVE_VALUE_LENGTH = 8;

function currentDateIso(): string {
  return new Date().toISOString().slice(0, 10);
}

function currentTimeIso(): string {
  return new Date().toISOString().slice(11, 19);
}

export function getLogDir(): string {
  return path.resolve(process.env.RELEASE_VERIFY_LOG_DIR ?? 'memory');
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Redact secrets from text that is about to be printed or persisted.
 *
 * Handles `key=value` / `key: value` pairs whose key looks sensitive, and the
 * raw values of sensitive environment variables wherever they appear.
 */
export function scrubSensitiveText(text: string): string {
  let scrubbed = text.replace(KEY_VALUE_PATTERN, (_match, key: string) => `${key}=[REDACTED]`);

  for (const [name, value] of Object.entries(process.env)) {
    if (!value || value.length < MIN_SENSITIVE_VALUE_LENGTH || !SENSITIVE_ENV_PATTERN.test(name)) {
      continue;
    }
    scrubbed = scrubbed.replace(new RegExp(escapeRegExp(value), 'g'), '[REDACTED]');
  }

  return scrubbed;
}

async function appendToDailyLog(entry: string): Promise<void> {
  const logDir = getLogDir();
  const logPath = path.join(logDir, `${currentDateIso()}.md`);
  try {
    await mkdir(logDir, { recursive: true });
    await appendFile(logPath, entry, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Logger] Failed to write ${logPath}: ${message}`);
  }
}

/** Print a narration line and keep it in the daily log. */
export async function logThought(message: string): Promise<void> {
  const safe = scrubSensitiveText(message);
  console.log(safe);
  await appendToDailyLog(`- ${currentTimeIso()} ${safe}\n`);
}

/** Record an external command with its (scrubbed) output and exit code. */
export async function logSystemCommand(command: string, output: string, exitCode: number): Promise<void> {
  const safeCommand = scrubSensitiveText(command);
  const safeOutput = scrubSensitiveText(output.trim()) || '(no output)';
  await appendToDailyLog(
    [
      `### ${currentTimeIso()} \`${safeCommand}\` (exit ${exitCode})`,
      '```',
      safeOutput,
      '```',
      '',
    ].join('\n'),
  );
}
