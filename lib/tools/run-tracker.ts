/**
 * Run Tracker - In-memory record of pipeline state transitions per run
 */

import type { PipelineState } from '../types';
import { Logger } from '../utils';

export interface StateTransition {
  state: PipelineState;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
}

export interface RunProgress {
  runId: string;
  startedAt: string;
  status: 'running' | 'completed' | 'failed';
  currentState: PipelineState;
  progress: number; // 0-100
  transitions: StateTransition[];
}

// Forward-only: there is no retry state and no way back
const ALLOWED_TRANSITIONS: Record<PipelineState, PipelineState[]> = {
  Fetching: ['Normalizing', 'Failed'],
  Normalizing: ['Filtering', 'Failed'],
  Filtering: ['Serializing', 'Projecting', 'Failed'],
  Serializing: ['Prompting', 'Failed'],
  Prompting: ['Completing', 'Failed'],
  Completing: ['Extracting', 'Failed'],
  Extracting: ['Done', 'Failed'],
  Projecting: ['Done', 'Failed'],
  Done: [],
  Failed: ['Projecting'],
};

const STATE_PROGRESS: Record<PipelineState, number> = {
  Fetching: 10,
  Normalizing: 30,
  Filtering: 45,
  Serializing: 55,
  Prompting: 60,
  Completing: 70,
  Extracting: 90,
  Projecting: 90,
  Done: 100,
  Failed: 100,
};

export class InvalidTransitionError extends Error {
  constructor(public readonly from: PipelineState, public readonly to: PipelineState) {
    super(`Invalid pipeline transition ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export class RunTracker {
  private runs: Map<string, RunProgress> = new Map();

  startRun(runId: string, message = 'Fetching feeds'): RunProgress {
    const run: RunProgress = {
      runId,
      startedAt: new Date().toISOString(),
      status: 'running',
      currentState: 'Fetching',
      progress: STATE_PROGRESS.Fetching,
      transitions: [{ state: 'Fetching', message, timestamp: new Date().toISOString() }],
    };
    this.runs.set(runId, run);
    Logger.debug('Pipeline state', { runId, state: 'Fetching', message });
    return run;
  }

  transition(runId: string, state: PipelineState, message: string, details?: Record<string, unknown>): void {
    const run = this.runs.get(runId);
    if (!run) {
      throw new Error(`Unknown run ${runId}`);
    }

    if (!ALLOWED_TRANSITIONS[run.currentState].includes(state)) {
      throw new InvalidTransitionError(run.currentState, state);
    }

    run.transitions.push({
      state,
      message,
      ...(details && { details }),
      timestamp: new Date().toISOString(),
    });
    run.currentState = state;
    run.progress = STATE_PROGRESS[state];

    if (state === 'Done') {
      run.status = 'completed';
    } else if (state === 'Failed') {
      run.status = 'failed';
    } else {
      run.status = 'running';
    }

    Logger.debug('Pipeline state', { runId, state, message });
  }

  getProgress(runId: string): RunProgress | null {
    return this.runs.get(runId) || null;
  }

  states(runId: string): PipelineState[] {
    return (this.runs.get(runId)?.transitions ?? []).map(transition => transition.state);
  }
}
