/**
 * Base Agent class - Foundation for the pipeline stages
 */

import type { AgentMessage } from '../types';
import { Logger } from '../utils';
import { describeError } from '../errors';

export interface AgentConfig {
  name: string;
}

export abstract class BaseAgent<TInput, TOutput> {
  protected config: AgentConfig;

  constructor(config: AgentConfig) {
    this.config = config;
  }

  get name(): string {
    return this.config.name;
  }

  /**
   * Runs the stage once. Failures are logged with timing and rethrown; the
   * pipeline has no retry state.
   */
  async execute(runId: string, input: TInput): Promise<AgentMessage<TInput, TOutput> & { output: TOutput }> {
    const startTime = Date.now();

    Logger.info(`${this.config.name} starting`, { runId });

    try {
      const output = await this.process(input, runId);
      const durationMs = Date.now() - startTime;

      Logger.info(`${this.config.name} completed`, { runId, duration_ms: durationMs });

      return {
        agent: this.config.name,
        run_id: runId,
        timestamp: new Date(startTime).toISOString(),
        input,
        output,
        errors: [],
        duration_ms: durationMs,
      };
    } catch (error) {
      Logger.error(`${this.config.name} failed`, {
        runId,
        error: describeError(error),
        duration_ms: Date.now() - startTime,
      });
      throw error;
    }
  }

  protected abstract process(input: TInput, runId: string): Promise<TOutput>;
}
