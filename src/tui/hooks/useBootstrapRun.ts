import { useState, useCallback } from 'react';
import type { FailureCause, RunResult } from '../../core/sequencer.js';
import type { BootstrapStep } from '../../core/steps.js';
import { formatDuration } from '../../ui/format.js';
import type { TaskStep, TaskStatus } from '../types.js';

export interface BootstrapRunState {
  steps: TaskStep[];
  overall: TaskStatus;
  result?: RunResult;
  error?: string;
}

export function idleSteps(steps: readonly BootstrapStep[]): TaskStep[] {
  return steps.map((s): TaskStep => ({ name: s.name, label: s.label, status: 'idle' }));
}

/**
 * Pure transitions, shared by the hook and its tests.
 */
export function markStep(
  steps: TaskStep[],
  name: string,
  status: TaskStatus,
  detail?: string,
): TaskStep[] {
  return steps.map((s) => (s.name === name ? { ...s, status, detail } : s));
}

export function useBootstrapRun(initial: TaskStep[]) {
  const [state, setState] = useState<BootstrapRunState>({ steps: initial, overall: 'idle' });

  const start = useCallback((name: string) => {
    setState((prev) => ({ ...prev, overall: 'running', steps: markStep(prev.steps, name, 'running') }));
  }, []);

  const succeed = useCallback((name: string, durationMs: number) => {
    setState((prev) => ({
      ...prev,
      steps: markStep(prev.steps, name, 'success', formatDuration(durationMs)),
    }));
  }, []);

  const fail = useCallback((name: string, cause: FailureCause) => {
    setState((prev) => ({
      ...prev,
      steps: markStep(prev.steps, name, 'error', cause.message),
    }));
  }, []);

  const finish = useCallback((result: RunResult) => {
    setState((prev) => ({
      ...prev,
      result,
      overall: result.status === 'completed' ? 'success' : 'error',
    }));
  }, []);

  const crash = useCallback((message: string) => {
    setState((prev) => ({ ...prev, overall: 'error', error: message }));
  }, []);

  return { state, start, succeed, fail, finish, crash };
}
