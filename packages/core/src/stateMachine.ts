import type { RunStatus } from '@runwright/shared';

const validRunTransitions: Record<RunStatus, RunStatus[]> = {
  pending: ['running', 'failed'],
  running: ['completed', 'failed', 'timed_out'],
  completed: [],
  failed: [],
  timed_out: [],
};

export function canTransitionRun(from: RunStatus, to: RunStatus): boolean {
  return validRunTransitions[from].includes(to);
}

export function transitionRun(current: RunStatus, next: RunStatus): RunStatus {
  if (!canTransitionRun(current, next)) {
    throw new Error(`Invalid run transition: ${current} -> ${next}`);
  }
  return next;
}

export function isRunTerminal(status: RunStatus): boolean {
  return validRunTransitions[status].length === 0;
}
