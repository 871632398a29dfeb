/**
 * Base Agent class - Foundation for the three pipeline stages
 */

import type { AgentMessage } from '../types';
import { Logger, errorMessage } from '../utils';

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
   * Run the stage once. Failures are recorded on the returned message and
   * logged; they never propagate to the caller.
   */
  async execute(runId: string, input: TInput): Promise<AgentMessage<TInput, TOutput>> {
    const startTime = Date.now();

    const message: AgentMessage<TInput, TOutput> = {
      agent: this.config.name,
      run_id: runId,
      timestamp: new Date().toISOString(),
      input,
      errors: [],
    };

    try {
      Logger.info(`${this.config.name} starting`, { runId });

      message.output = await this.process(input);
      message.duration_ms = Date.now() - startTime;

      Logger.info(`${this.config.name} completed`, {
        runId,
        duration_ms: message.duration_ms,
        output: message.output,
      });
    } catch (error) {
      message.errors.push(errorMessage(error));
      message.duration_ms = Date.now() - startTime;

      Logger.error(`${this.config.name} failed`, {
        runId,
        error: errorMessage(error),
        duration_ms: message.duration_ms,
      });
    }

    return message;
  }

  protected abstract process(input: TInput): Promise<TOutput>;
}
