/**
 * Plain-text rendering of errors, plans and run results for the CLI.
 */

import { TypedError } from '../domain/errors';
import { Run } from '../domain/run';
import { CompiledPlan } from '../dsl/compiler';

/** `error CODE [step]: message`, the stderr tail and one line per suggested fix. */
export function formatTypedError(error: TypedError): string[] {
  const where = error.stepId ? ` [${error.stepId}]` : '';
  const lines = [`error ${error.code}${where}: ${error.message}`];
  const stderr = error.details?.stderr;
  if (typeof stderr === 'string' && stderr !== '') {
    for (const line of stderr.split('\n')) lines.push(`    ${line}`);
  }
  for (const fix of error.suggestedFixes) {
    lines.push(`  fix: ${fix.description ?? fix.type}`);
  }
  return lines;
}

function minutes(ms: number): string {
  return `${Math.round((ms / 60_000) * 100) / 100}m`;
}

export function formatPlan(plan: CompiledPlan): string[] {
  const lines = [
    `Pipeline "${plan.pipelineName}" (spec ${plan.specVersion})`,
    `Plan hash: ${plan.planHash.algorithm}:${plan.planHash.digest}`,
    `Trigger: push to ${plan.branches.join(', ')}${plan.conditionSource ? ` if ${plan.conditionSource}` : ''}`,
    `Job timeout: ${minutes(plan.jobTimeoutMs)}`,
  ];
  plan.executionOrder.forEach((stepId, index) => {
    const step = plan.steps[stepId];
    if (!step) return;
    let line = `  ${index + 1}. ${step.id} [${step.type}] ${step.name}`;
    if (step.workingDirectory !== '.') line += ` in ${step.workingDirectory}`;
    if (step.policy.timeoutMs !== undefined) line += ` timeout=${minutes(step.policy.timeoutMs)}`;
    if (step.policy.maxAttempts > 1) line += ` attempts=${step.policy.maxAttempts}`;
    if (step.conditionSource) line += ` if ${step.conditionSource}`;
    lines.push(line);
  });
  return lines;
}

/** One line per step, then the run outcome. */
export function formatRunSummary(run: Run): string[] {
  const lines = run.stepOrder.map((stepId) => {
    const result = run.stepResults[stepId];
    const status = result?.status ?? 'unknown';
    const reason = result?.skipReason ? ` (${result.skipReason})` : '';
    return `  ${status.padEnd(9)} ${stepId}${reason}`;
  });
  const skip = run.skipReason ? ` (${run.skipReason})` : '';
  const dryRun = run.dryRun ? ' [dry-run]' : '';
  lines.push(`Run ${run.status}: ${run.pipelineName}${skip}${dryRun}`);
  return lines;
}
