import type { PipelineRun, StageOutcomeStatus, StageResult } from '../types/verification.js';
import { describeError } from '../utils/errors.js';

const OUTCOME_ICONS: Record<StageOutcomeStatus, string> = {
  passed: '✓',
  failed: '✗',
  skipped: '-',
};

function indent(text: string, prefix = '    '): string {
  return text
    .split('\n')
    .map((line) => `${prefix}${line}`)
    .join('\n');
}

export function formatStage(stage: StageResult): string {
  const icon = OUTCOME_ICONS[stage.outcome];
  return `  ${icon} [${stage.outcome.toUpperCase().padEnd(7)}] ${stage.stage}: ${stage.detail}`;
}

/**
 * Everything needed to diagnose a failed run in one place: the failing stage,
 * the error (both fingerprints for drift), any raw probe output and the
 * remote log tail.
 */
export function formatFailure(run: PipelineRun): string[] {
  if (run.status !== 'failed' || !run.failedStage) {
    return [];
  }
  const failedStage = run.stages.find((stage) => stage.stage === run.failedStage);
  const lines = [`Failed stage: ${run.failedStage}`];

  if (run.error) {
    lines.push(`Error (${run.error.kind}): ${describeError(run.error)}`);
    if (run.error.kind === 'Drift') {
      lines.push(`   First cert:  ${run.error.first}`, `   Second cert: ${run.error.second}`);
    }
    if (run.error.kind === 'BuildFailure' || run.error.kind === 'RemoteCommandFailure') {
      lines.push('Command output:', indent(run.error.output || '(no output)'));
    }
  }
  if (failedStage?.diagnostic) {
    lines.push(
      run.error?.kind === 'ProtocolFailure' ? 'Fallback HTTPS output:' : 'Probe output:',
      indent(failedStage.diagnostic),
    );
  }
  if (run.logTail !== null) {
    lines.push('Remote server log (tail):', indent(run.logTail));
  }
  return lines;
}

export function formatRunReport(run: PipelineRun): string {
  const lines = [
    '',
    `Release verification for ${run.target}`,
    '══════════════════════════════════════',
    ...run.stages.map(formatStage),
    '──────────────────────────────────────',
    `Result: ${run.status === 'passed' ? 'PASSED' : 'FAILED'}  (${run.stages.length} stage(s) executed)`,
  ];
  const failure = formatFailure(run);
  if (failure.length > 0) {
    lines.push('', ...failure);
  }
  if (run.reportPath) {
    lines.push(`Run record: ${run.reportPath}`);
  }
  lines.push('');
  return lines.join('\n');
}
