/**
 * Base agent: input/output validation, per-run log buffer, result envelope.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { agentLog, describeError, shouldPrint } from '@prepscout/core';
import type { Agent, AgentConfig, AgentContext, AgentResult, AgentLog } from './types.js';

export abstract class BaseAgent<TInput, TOutput> implements Agent<TInput, TOutput> {
  abstract config: AgentConfig;
  abstract inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  abstract outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;

  protected logs: AgentLog[] = [];

  protected log(level: AgentLog['level'], message: string, data?: unknown): void {
    this.logs.push({ timestamp: new Date(), level, message, data });
    agentLog(this.config.name, message, {
      level,
      detail: data === undefined ? undefined : describeError(data),
    });

    if (shouldPrint(level)) {
      console.log(`[${this.config.name}] [${level.toUpperCase()}] ${message}`, data ?? '');
    }
  }

  protected debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  protected info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  protected warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  protected error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  /**
   * Validate input, run, validate output. Never throws: failures come back
   * as `{ success: false, error }`.
   */
  async execute(input: unknown, context?: Partial<AgentContext>): Promise<AgentResult<TOutput>> {
    const startTime = Date.now();
    this.logs = [];

    const fullContext: AgentContext = {
      timestamp: new Date(),
      ...context,
    };

    this.debug('Starting execution', { runId: fullContext.runId });

    try {
      const validatedInput = this.inputSchema.parse(input);
      const output = await this.run(validatedInput, fullContext);
      const validatedOutput = this.outputSchema.parse(output);

      const duration = Date.now() - startTime;
      this.info(`Completed in ${duration}ms`);

      return { success: true, data: validatedOutput, duration, context: fullContext };
    } catch (err) {
      const duration = Date.now() - startTime;
      const errorMessage = describeError(err);
      this.error(`Execution failed: ${errorMessage}`);

      return { success: false, error: errorMessage, duration, context: fullContext };
    }
  }

  protected abstract run(input: TInput, context: AgentContext): Promise<TOutput>;

  getLogs(): AgentLog[] {
    return [...this.logs];
  }
}
