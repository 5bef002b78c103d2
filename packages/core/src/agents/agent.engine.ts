import { EventEmitter } from 'node:events';
import * as crypto from 'node:crypto';
import * as path from 'node:path';
import type { Logger } from 'pino';
import type {
  AgentAction,
  BreakpointKind,
  Checkpoint,
  DebugInfo,
  EngineState,
  EngineStatus,
  MessageRole,
  RelatedTask,
  StepwiseConfig,
  TaskHistoryEntry,
  TaskMessage,
  TaskStateSnapshot,
  ToolExecutionRecord,
} from '@stepwise/shared';
import { TaskState } from '../state/task.state.js';
import type { StateStorage } from '../storage/storage.types.js';
import { CheckpointError } from '../storage/storage.types.js';
import type { RateLimiter } from '../ratelimit/rate.limiter.js';
import { ApprovalGate, type ApprovalCallback } from '../approval/approval.gate.js';
import { DebugSession } from '../debug/debug.session.js';
import { ToolRegistry } from '../tools/tool.registry.js';
import type { ToolImpl } from '../tools/tool.types.js';
import { silentLogger } from '../logging/logger.js';
import type { Oracle } from './llm.oracle.js';
import {
  ConfigurationError,
  IterationLimitExceededError,
  UnknownToolError,
} from './agent.errors.js';

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

/** Hooks for an interactive debugger. Every hook is awaited, so it can pause the loop. */
export interface DebugCallback {
  onBreak(info: DebugInfo): void | Promise<void>;
  onStep?(info: DebugInfo): void | Promise<void>;
  onError?(error: Error, info: DebugInfo): void | Promise<void>;
}

export type EngineConfig = Pick<
  StepwiseConfig,
  | 'working_directory'
  | 'max_iterations'
  | 'auto_approve_tools'
  | 'max_consecutive_auto_approvals'
  | 'approval_timeout_ms'
  | 'state_storage'
  | 'debug'
>;

export interface AgentEngineOptions {
  config: EngineConfig;
  /** Without one, executeTask throws ConfigurationError. */
  oracle: Oracle | null;
  storage: StateStorage;
  approval: ApprovalCallback;
  rateLimiter: RateLimiter;
  tools?: ToolRegistry;
  debugSession?: DebugSession;
  logger?: Logger;
  now?: () => number;
}

const ITERATION_LIMIT_MESSAGE = 'Maximum iterations reached';

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

// ---------------------------------------------------------------------------
// Event type augmentation
// ---------------------------------------------------------------------------

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface AgentEngine {
  /** Emitted on every status transition. */
  on(event: 'status', listener: (state: EngineState) => void): this;
  /** Emitted for each message added to the task state. */
  on(event: 'message', listener: (message: TaskMessage) => void): this;
  /** Emitted after each tool execution is recorded. */
  on(event: 'tool', listener: (record: ToolExecutionRecord) => void): this;

  emit(event: 'status', state: EngineState): boolean;
  emit(event: 'message', message: TaskMessage): boolean;
  emit(event: 'tool', record: ToolExecutionRecord): boolean;
}

// ---------------------------------------------------------------------------
// AgentEngine
// ---------------------------------------------------------------------------

/**
 * Runs one task at a time as a think/act loop:
 *
 *   oracle → (completion | tool → approval → execute → persist → checkpoint)
 *
 * bounded by `max_iterations`. Every exit path persists the final state.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class AgentEngine extends EventEmitter {
  readonly tools: ToolRegistry;
  readonly debugSession: DebugSession;
  private readonly config: EngineConfig;
  private readonly oracle: Oracle | null;
  private readonly storage: StateStorage;
  private readonly rateLimiter: RateLimiter;
  private readonly gate: ApprovalGate;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly workingDirectory: string;
  private readonly _state: TaskState;
  private checkpointCount = 0;
  private engineState: EngineState = {
    status: 'idle',
    taskId: null,
    iteration: 0,
    currentAction: null,
  };

  constructor(options: AgentEngineOptions) {
    super();
    this.config = options.config;
    this.oracle = options.oracle;
    this.storage = options.storage;
    this.rateLimiter = options.rateLimiter;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'engine' });
    this.now = options.now ?? Date.now;
    this.workingDirectory = path.resolve(options.config.working_directory);
    this.tools = options.tools ?? new ToolRegistry(undefined, options.logger);
    this.debugSession =
      options.debugSession ??
      new DebugSession({
        stepByStep: options.config.debug.step_by_step,
        breakpoints: options.config.debug.breakpoints,
        logger: options.logger,
        now: this.now,
      });
    this.gate = new ApprovalGate(
      options.approval,
      {
        autoApprove: options.config.auto_approve_tools,
        maxConsecutiveAutoApprovals: options.config.max_consecutive_auto_approvals,
        timeoutMs: options.config.approval_timeout_ms,
      },
      options.logger,
    );
    this._state = new TaskState(this.now);
  }

  get state(): TaskState {
    return this._state;
  }

  /** Empty until the first task starts. */
  get taskId(): string {
    return this._state.taskId;
  }

  get status(): EngineState {
    return { ...this.engineState };
  }

  // ---------------------------------------------------------------------------
  // Task loop
  // ---------------------------------------------------------------------------

  /**
   * Run `task` to completion and return its result. Throws on any fatal
   * error, including the iteration cap, after marking the task failed.
   */
  async executeTask(task: string, debugCallback?: DebugCallback): Promise<string> {
    const oracle = this.oracle;
    if (!oracle) {
      throw new ConfigurationError('No oracle configured: cannot execute tasks');
    }

    const taskId = crypto.randomUUID();
    this._state.startNewTask(task, taskId);
    this.checkpointCount = 0;
    const log = this.logger.child({ taskId });
    log.info({ task }, 'task started');

    if (this.config.debug.enabled) {
      this.debugSession.start();
    }

    let iteration = 0;
    try {
      await this.saveMessage('system', `Starting task: ${task}`);
      this._state.addRelatedTasks(await this.storage.getRelatedTasks(taskId));

      const maxIterations = this.config.max_iterations;
      while (iteration < maxIterations) {
        iteration++;
        this.setStatus('thinking', iteration, null);

        await this.checkBreakpoint('llm', { task, state: this._state.toSnapshot() }, debugCallback);

        await this.rateLimiter.acquire();
        const action = await oracle.getNextAction(task, this._state, this.tools.getToolNames());
        log.debug({ iteration, toolName: action.toolName, isComplete: action.isComplete }, 'action');

        await this.saveMessage('assistant', action.thoughts);

        if (action.isComplete) {
          const result = action.result ?? action.thoughts;
          this._state.markComplete();
          await this.saveMessage('system', `Task completed: ${result}`, { result });
          this.setStatus('complete', iteration, null);
          log.info({ iteration, duration: this._state.getTaskDuration() }, 'task completed');
          return result;
        }

        if (action.toolName) {
          await this.dispatchTool(action.toolName, action, iteration, debugCallback);
        }
      }

      this._state.markFailed(ITERATION_LIMIT_MESSAGE);
      throw new IterationLimitExceededError(maxIterations);
    } catch (err) {
      const error = toError(err);
      if (!this._state.isFailed) {
        this._state.markFailed(error.message);
      }
      this.setStatus('failed', iteration, null);
      log.error({ err: error, iteration }, 'task failed');
      if (this.debugSession.active) {
        await this.reportError(error, debugCallback);
      }
      throw error;
    } finally {
      await this.persist();
      if (this.debugSession.active) {
        this.debugSession.stop();
      }
    }
  }

  private async dispatchTool(
    toolName: string,
    action: AgentAction,
    iteration: number,
    debugCallback?: DebugCallback,
  ): Promise<void> {
    if (!this.tools.has(toolName)) {
      throw new UnknownToolError(toolName);
    }
    const args = action.toolArgs;

    await this.checkBreakpoint(
      'tool',
      { toolName, args, state: this._state.toSnapshot() },
      debugCallback,
    );

    this.setStatus('awaiting_approval', iteration, toolName);
    const decision = await this.gate.authorize(this._state, toolName, args, action.thoughts);
    if (decision === 'rejected') {
      this.logger.info({ taskId: this.taskId, toolName }, 'tool call rejected');
      return;
    }

    this.setStatus('acting', iteration, toolName);
    const result = await this.tools.execute(
      { tool: toolName, parameters: args },
      { taskId: this.taskId, workingDirectory: this.workingDirectory },
    );
    const record = this._state.addToolResult(toolName, args, result);
    this.emit('tool', record);
    await this.persist();

    if (this.config.state_storage.auto_checkpoint) {
      await this.createCheckpoint(`After executing tool: ${toolName}`);
    }

    await this.checkBreakpoint('state', { toolName, state: this._state.toSnapshot() }, debugCallback);
  }

  private async checkBreakpoint(
    kind: BreakpointKind,
    details: Record<string, unknown>,
    debugCallback?: DebugCallback,
  ): Promise<void> {
    if (!this.debugSession.shouldBreak(kind, details)) return;

    const info: DebugInfo = {
      timestamp: this.now(),
      action: kind,
      details,
      context: { state: this._state.toSnapshot() },
    };
    this.logger.debug({ taskId: this.taskId, kind }, 'breakpoint hit');
    if (!debugCallback) return;

    const previous = this.engineState.status;
    this.setStatus('paused', this.engineState.iteration, this.engineState.currentAction);
    await debugCallback.onBreak(info);
    if (this.debugSession.stepByStep && debugCallback.onStep) {
      await debugCallback.onStep(info);
    }
    this.setStatus(previous, this.engineState.iteration, this.engineState.currentAction);
  }

  private async reportError(error: Error, debugCallback?: DebugCallback): Promise<void> {
    if (!debugCallback?.onError) return;
    const info: DebugInfo = {
      timestamp: this.now(),
      action: 'error',
      details: { error: error.message },
      context: { state: this._state.toSnapshot() },
    };
    try {
      await debugCallback.onError(error, info);
    } catch (hookErr) {
      this.logger.warn({ err: toError(hookErr) }, 'debug error hook threw');
    }
  }

  private setStatus(status: EngineStatus, iteration: number, currentAction: string | null): void {
    this.engineState = {
      status,
      taskId: this.taskId || null,
      iteration,
      currentAction,
    };
    this.emit('status', this.status);
  }

  private async persist(): Promise<void> {
    if (!this.taskId) return;
    await this.storage.saveState(this.taskId, this._state.toSnapshot());
  }

  // ---------------------------------------------------------------------------
  // Session operations
  // ---------------------------------------------------------------------------

  registerTool(tool: ToolImpl): void {
    this.tools.register(tool);
  }

  async saveMessage(
    role: MessageRole,
    content: string,
    metadata: Record<string, unknown> = {},
  ): Promise<TaskMessage> {
    const message = this._state.addMessage(role, content, metadata);
    this.emit('message', message);
    await this.persist();
    return message;
  }

  async saveUserInput(content: string, metadata: Record<string, unknown> = {}): Promise<void> {
    this._state.addUserInput(content, metadata);
    await this.persist();
  }

  async updateContext(updates: Record<string, unknown>): Promise<void> {
    this._state.updateContext(updates);
    await this.persist();
  }

  async getRelatedTasks(limit = 5): Promise<RelatedTask[]> {
    if (!this.taskId) return [];
    return this.storage.getRelatedTasks(this.taskId, limit);
  }

  /** Storage search hits, each enriched with the stored task text and outcome. */
  async searchTaskHistory(query: string, limit = 10): Promise<TaskHistoryEntry[]> {
    const hits = await this.storage.searchTaskHistory(query, limit);
    const entries: TaskHistoryEntry[] = [];
    for (const hit of hits) {
      const stored = await this.storage.loadState(hit.taskId);
      entries.push({
        taskId: hit.taskId,
        relevance: hit.relevance,
        task: stored?.task ?? '',
        completed: stored?.isComplete ?? false,
      });
    }
    return entries;
  }

  /**
   * Checkpoint the current task. Returns null once the per-task cap is
   * reached or when the backend fails; neither interrupts the task.
   */
  async createCheckpoint(description: string): Promise<Checkpoint | null> {
    const max = this.config.state_storage.max_checkpoints;
    if (this.checkpointCount >= max) {
      this.logger.debug({ taskId: this.taskId, max }, 'checkpoint cap reached');
      return null;
    }

    try {
      const checkpoint = await this.storage.createCheckpoint(this.taskId, description);
      this.checkpointCount++;
      return checkpoint;
    } catch (err) {
      const error = new CheckpointError(
        `Failed to create checkpoint: ${toError(err).message}`,
        { cause: err },
      );
      this.logger.warn({ err: error, taskId: this.taskId }, 'checkpoint skipped');
      return null;
    }
  }

  async listCheckpoints(): Promise<Checkpoint[]> {
    if (!this.taskId) return [];
    return this.storage.listCheckpoints(this.taskId);
  }

  /** The live state is replaced only when the checkpoint belongs to the current task. */
  async restoreCheckpoint(checkpointId: string): Promise<TaskStateSnapshot> {
    const snapshot = await this.storage.restoreCheckpoint(checkpointId);
    if (snapshot.taskId === this.taskId) {
      this._state.restore(snapshot);
    }
    this.logger.info({ taskId: snapshot.taskId, checkpointId }, 'checkpoint restored');
    return snapshot;
  }

  async close(): Promise<void> {
    await this.storage.close();
  }
}
