/**
 * Base Agent class - Foundation for all agents in the pipeline
 */

import { AgentMessage } from '../types';
import { Logger, retry } from '../utils';

export interface AgentConfig {
  name: string;
  /** Total attempts for `process`; 1 means no retry */
  retries?: number;
  retryDelayMs?: number;
}

export abstract class BaseAgent<TInput, TOutput> {
  protected config: Required<AgentConfig>;

  constructor(config: AgentConfig) {
    this.config = {
      retries: 1,
      retryDelayMs: 1000,
      ...config,
    };
  }

  get name(): string {
    return this.config.name;
  }

  /**
   * Main execution method - timing, logging and optional retry around process()
   */
  async execute(runId: string, input: TInput): Promise<AgentMessage<TInput, TOutput>> {
    const startTime = Date.now();
    Logger.info(`${this.config.name} starting`, { runId });

    try {
      const output = await retry(
        () => this.process(input),
        {
          maxRetries: this.config.retries,
          delayMs: this.config.retryDelayMs,
          backoff: true,
          onError: (error, attempt) => {
            if (attempt < this.config.retries) {
              Logger.warn(`${this.config.name} retry ${attempt}`, {
                error: error.message,
              });
            }
          },
        }
      );

      const durationMs = Date.now() - startTime;
      Logger.info(`${this.config.name} completed`, {
        runId,
        duration_ms: durationMs,
      });

      return {
        agent: this.config.name,
        run_id: runId,
        timestamp: new Date(startTime).toISOString(),
        input,
        output,
        duration_ms: durationMs,
      };
    } catch (error) {
      Logger.error(`${this.config.name} failed`, {
        runId,
        error: error instanceof Error ? `${error.name}: ${error.message}` : String(error),
        duration_ms: Date.now() - startTime,
      });
      throw error;
    }
  }

  /**
   * Abstract method - must be implemented by each agent
   */
  protected abstract process(input: TInput): Promise<TOutput>;
}
