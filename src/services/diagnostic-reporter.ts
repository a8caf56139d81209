import type { RemoteHostControl } from '../types/verification.js';
import { logThought } from '../utils/logger.js';

export const NO_LOG_FOUND = 'No server log found';

/**
 * Fetches the remote service log tail for a failure report. At most one
 * capture happens per reporter; later calls return the first result.
 */
export class DiagnosticReporter {
  readonly #remote: RemoteHostControl;
  #captured: string | null = null;
  #captureCount = 0;

  constructor(remote: RemoteHostControl) {
    this.#remote = remote;
  }

  get captureCount(): number {
    return this.#captureCount;
  }

  async captureLogTail(lines: number): Promise<string> {
    if (this.#captured !== null) {
      return this.#captured;
    }
    this.#captureCount += 1;

    await logThought(`[Diagnostics] Fetching last ${lines} line(s) of the server log from ${this.#remote.host}...`);
    const result = await this.#remote.tailLog(lines);
    const tail = result.output.trim();
    this.#captured = result.ok ? tail || '(server log is empty)' : `${NO_LOG_FOUND}${tail ? `: ${tail}` : ''}`;
    return this.#captured;
  }
}
