import type { Logger } from 'pino';
import { silentLogger } from '../logging/logger.js';
import type { TaskState } from '../state/task.state.js';

/** Asks a human (or a policy) whether a tool call may run. */
export interface ApprovalCallback {
  getApproval(
    toolName: string,
    args: Record<string, unknown>,
    description?: string,
  ): Promise<boolean>;
  /** Called when the gate stops waiting for the outstanding request. */
  withdrawApproval?(): void;
}

export interface ApprovalPolicy {
  autoApprove: boolean;
  maxConsecutiveAutoApprovals: number;
  /** 0 waits for an answer indefinitely. */
  timeoutMs: number;
}

export type ApprovalDecision = 'auto' | 'granted' | 'rejected';

/**
 * Auto-approves up to a streak of consecutive tool calls, then falls back to
 * the callback. The streak counter lives on the task state.
 */
export class ApprovalGate {
  private readonly logger: Logger;

  constructor(
    private readonly callback: ApprovalCallback,
    private readonly policy: ApprovalPolicy,
    logger?: Logger,
  ) {
    this.logger = (logger ?? silentLogger()).child({ component: 'approval' });
  }

  async authorize(
    state: TaskState,
    toolName: string,
    args: Record<string, unknown>,
    description?: string,
  ): Promise<ApprovalDecision> {
    const mustAsk =
      !this.policy.autoApprove ||
      state.consecutiveAutoApprovals >= this.policy.maxConsecutiveAutoApprovals;

    if (!mustAsk) {
      state.incrementAutoApprovals();
      return 'auto';
    }

    const approved = await this.ask(toolName, args, description);
    if (!approved) return 'rejected';
    state.resetAutoApprovals();
    return 'granted';
  }

  private ask(
    toolName: string,
    args: Record<string, unknown>,
    description?: string,
  ): Promise<boolean> {
    const request = this.callback.getApproval(toolName, args, description);
    if (this.policy.timeoutMs <= 0) return request;

    return new Promise<boolean>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.logger.warn({ toolName, timeoutMs: this.policy.timeoutMs }, 'approval timed out');
        this.callback.withdrawApproval?.();
        resolve(false);
      }, this.policy.timeoutMs);
      request.then(
        (approved) => {
          clearTimeout(timer);
          resolve(approved);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        },
      );
    });
  }
}
