import type { DetectedListener, PortCandidate, ProbeResult, ProbeSuite } from '../types/verification.js';
import { fail, ok } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';

/**
 * Probe the candidates in order; the first port that accepts a TCP connection
 * decides the service mode. No reachable candidate is a `NoListener` failure.
 */
export async function detectHttpsPort(
  host: string,
  probes: Pick<ProbeSuite, 'tcpReachable'>,
  candidates: readonly PortCandidate[],
  timeoutMs: number,
): Promise<ProbeResult<DetectedListener>> {
  for (const candidate of candidates) {
    if (await probes.tcpReachable(host, candidate.port, timeoutMs)) {
      await logThought(`[Probe] Port ${candidate.port} is open (${candidate.mode} mode).`);
      return ok({ port: candidate.port, mode: candidate.mode });
    }
    await logThought(`[Probe] Port ${candidate.port} is not accessible.`);
  }
  return fail({ kind: 'NoListener', host, ports: candidates.map((candidate) => candidate.port) });
}
