/**
 * Gate Evaluator — decides from direct upstream results whether a stage may run.
 * No side effects.
 */
import type { StageDefinition, StageResult } from './types.js';

export type GateDecision =
  | { action: 'proceed' }
  | { action: 'skip'; reason: string }
  | { action: 'fail-pipeline'; reason: string; blockers: string[] };

export interface GateState {
  /** A blocking stage has already failed somewhere in the run. */
  halted: boolean;
}

/** A skipped upstream counts as failing; its own policy decides whether it blocks. */
function blocksDownstream(result: StageResult): boolean {
  return result.policy === 'blocking' && result.status !== 'success';
}

export function evaluateGate(
  stage: StageDefinition,
  upstream: StageResult[],
  state: GateState = { halted: false },
): GateDecision {
  const blockers = upstream.filter(blocksDownstream).map((r) => r.stage);
  if (blockers.length > 0) {
    return {
      action: 'fail-pipeline',
      reason: `blocked by ${blockers.join(', ')}`,
      blockers,
    };
  }

  if (state.halted) {
    return { action: 'skip', reason: `pipeline halted before ${stage.name} started` };
  }

  return { action: 'proceed' };
}

/** Inclusive: a measurement equal to the threshold passes. */
export function meetsThreshold(measured: number, threshold: number): boolean {
  return measured >= threshold;
}
