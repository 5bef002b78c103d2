import type { Logger } from 'pino';
import type { AgentAction, ChatMessage, ProviderAdapter } from '@stepwise/shared';
import type { TaskState } from '../state/task.state.js';
import type { ToolRegistry } from '../tools/tool.registry.js';
import { silentLogger } from '../logging/logger.js';
import { OracleCallError, TaskAbortedError } from './agent.errors.js';
import { parseAction } from './agent.parser.js';
import { buildSystemPrompt, buildTaskPrompt } from './agent.prompts.js';

/** Decides the next step of a task. */
export interface Oracle {
  getNextAction(task: string, state: TaskState, availableTools: string[]): Promise<AgentAction>;
}

/**
 * Oracle backed by a chat model. Transport and parse failures never escape:
 * they come back as a non-terminal action whose thoughts describe the error,
 * and the engine's loop carries on to the next iteration. Aborting `signal`
 * is the exception and fails the task with TaskAbortedError.
 */
export class LlmOracle implements Oracle {
  private readonly logger: Logger;

  constructor(
    private readonly provider: ProviderAdapter,
    private readonly registry: ToolRegistry,
    logger?: Logger,
    private readonly signal?: AbortSignal,
  ) {
    this.logger = (logger ?? silentLogger()).child({ component: 'oracle' });
  }

  async getNextAction(
    task: string,
    state: TaskState,
    availableTools: string[],
  ): Promise<AgentAction> {
    const allowed = new Set(availableTools);
    const definitions = this.registry.getDefinitions().filter((d) => allowed.has(d.name));
    const messages: ChatMessage[] = [
      { role: 'system', content: buildSystemPrompt(definitions) },
      { role: 'user', content: buildTaskPrompt(task, state) },
    ];

    if (this.signal?.aborted) throw new TaskAbortedError();

    let response = '';
    try {
      for await (const token of this.provider.complete(messages, this.signal)) {
        response += token;
      }
    } catch (err) {
      if (this.signal?.aborted) throw new TaskAbortedError({ cause: err });
      const error = new OracleCallError(
        `Error calling model: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
      this.logger.warn({ err: error, taskId: state.taskId }, 'model call failed');
      return {
        toolName: null,
        toolArgs: {},
        isComplete: false,
        result: null,
        thoughts: error.message,
      };
    }

    if (this.signal?.aborted) throw new TaskAbortedError();

    const usage = this.provider.getLastUsage?.() ?? null;
    this.logger.debug({ taskId: state.taskId, chars: response.length, usage }, 'model responded');
    return parseAction(response);
  }
}
