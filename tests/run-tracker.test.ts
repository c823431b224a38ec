import { describe, it, expect } from 'vitest';
import { InvalidTransitionError, RunTracker } from '../lib/tools/run-tracker';

describe('RunTracker', () => {
  it('should follow the enrichment path to Done', () => {
    const tracker = new RunTracker();
    tracker.startRun('run-1');
    for (const state of ['Normalizing', 'Filtering', 'Serializing', 'Prompting', 'Completing', 'Extracting', 'Done'] as const) {
      tracker.transition('run-1', state, state);
    }

    expect(tracker.states('run-1')).toEqual([
      'Fetching',
      'Normalizing',
      'Filtering',
      'Serializing',
      'Prompting',
      'Completing',
      'Extracting',
      'Done',
    ]);
    const progress = tracker.getProgress('run-1');
    expect(progress?.status).toBe('completed');
    expect(progress?.progress).toBe(100);
  });

  it('should follow the player path', () => {
    const tracker = new RunTracker();
    tracker.startRun('run-2');
    tracker.transition('run-2', 'Normalizing', 'n');
    tracker.transition('run-2', 'Filtering', 'f', { matched: 3 });
    tracker.transition('run-2', 'Projecting', 'p');
    tracker.transition('run-2', 'Done', 'd');

    expect(tracker.states('run-2')).toEqual(['Fetching', 'Normalizing', 'Filtering', 'Projecting', 'Done']);
    expect(tracker.getProgress('run-2')?.transitions[2].details).toEqual({ matched: 3 });
  });

  it('should reject going backwards', () => {
    const tracker = new RunTracker();
    tracker.startRun('run-3');
    tracker.transition('run-3', 'Normalizing', 'n');
    expect(() => tracker.transition('run-3', 'Fetching', 'again')).toThrow(InvalidTransitionError);
  });

  it('should reject skipping states', () => {
    const tracker = new RunTracker();
    tracker.startRun('run-4');
    expect(() => tracker.transition('run-4', 'Done', 'too soon')).toThrow('Invalid pipeline transition Fetching -> Done');
  });

  it('should allow failing from any running state', () => {
    const tracker = new RunTracker();
    tracker.startRun('run-5');
    tracker.transition('run-5', 'Failed', 'boom');
    expect(tracker.getProgress('run-5')?.status).toBe('failed');
  });

  it('should allow projecting after a failure and nothing after Done', () => {
    const tracker = new RunTracker();
    tracker.startRun('run-6');
    tracker.transition('run-6', 'Failed', 'enrichment failed');
    tracker.transition('run-6', 'Projecting', 'fallback');
    tracker.transition('run-6', 'Done', 'saved');
    expect(() => tracker.transition('run-6', 'Failed', 'late')).toThrow(InvalidTransitionError);
  });

  it('should only project after extraction by way of Failed', () => {
    const tracker = new RunTracker();
    tracker.startRun('run-7');
    for (const state of ['Normalizing', 'Filtering', 'Serializing', 'Prompting', 'Completing', 'Extracting'] as const) {
      tracker.transition('run-7', state, state);
    }
    expect(() => tracker.transition('run-7', 'Projecting', 'skip')).toThrow(
      'Invalid pipeline transition Extracting -> Projecting'
    );
    tracker.transition('run-7', 'Failed', 'malformed reply');
    tracker.transition('run-7', 'Projecting', 'fallback');
    expect(tracker.getProgress('run-7')?.currentState).toBe('Projecting');
  });

  it('should reject unknown runs', () => {
    const tracker = new RunTracker();
    expect(() => tracker.transition('missing', 'Normalizing', 'n')).toThrow('Unknown run missing');
    expect(tracker.getProgress('missing')).toBeNull();
    expect(tracker.states('missing')).toEqual([]);
  });
});
