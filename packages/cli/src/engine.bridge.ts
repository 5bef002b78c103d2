import { EventEmitter } from 'node:events';
import type { DebugInfo } from '@stepwise/shared';
import type { ApprovalCallback, DebugCallback } from '@stepwise/core';

export interface PendingApproval {
  toolName: string;
  args: Record<string, unknown>;
  description: string | undefined;
}

// ---------------------------------------------------------------------------
// Event type augmentation
// ---------------------------------------------------------------------------

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface EngineBridge {
  /** A tool call is waiting for y/n; null once answered. */
  on(event: 'approval', listener: (pending: PendingApproval | null) => void): this;
  /** The engine is paused at a breakpoint; null once resumed. */
  on(event: 'break', listener: (info: DebugInfo | null) => void): this;
  /** The task failed while debugging. */
  on(event: 'failure', listener: (error: Error) => void): this;

  emit(event: 'approval', pending: PendingApproval | null): boolean;
  emit(event: 'break', info: DebugInfo | null): boolean;
  emit(event: 'failure', error: Error): boolean;
}

/**
 * Turns the engine's awaited callbacks into UI state: each request is held
 * as a pending promise until the user answers it.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class EngineBridge extends EventEmitter implements ApprovalCallback, DebugCallback {
  private pendingApproval: { request: PendingApproval; resolve: (approved: boolean) => void } | null =
    null;
  private pendingBreak: { info: DebugInfo; resolve: () => void } | null = null;

  get approval(): PendingApproval | null {
    return this.pendingApproval?.request ?? null;
  }

  get breakpoint(): DebugInfo | null {
    return this.pendingBreak?.info ?? null;
  }

  getApproval(
    toolName: string,
    args: Record<string, unknown>,
    description?: string,
  ): Promise<boolean> {
    this.pendingApproval?.resolve(false);
    return new Promise<boolean>((resolve) => {
      const request: PendingApproval = { toolName, args, description };
      this.pendingApproval = { request, resolve };
      this.emit('approval', request);
    });
  }

  /** Returns false when nothing was waiting. */
  answerApproval(approved: boolean): boolean {
    const pending = this.pendingApproval;
    if (!pending) return false;
    this.pendingApproval = null;
    pending.resolve(approved);
    this.emit('approval', null);
    return true;
  }

  /** The engine stopped waiting; drop the prompt. */
  withdrawApproval(): void {
    this.answerApproval(false);
  }

  onBreak(info: DebugInfo): Promise<void> {
    return new Promise<void>((resolve) => {
      this.pendingBreak = { info, resolve };
      this.emit('break', info);
    });
  }

  /** Returns false when the engine was not paused. */
  resume(): boolean {
    const pending = this.pendingBreak;
    if (!pending) return false;
    this.pendingBreak = null;
    pending.resolve();
    this.emit('break', null);
    return true;
  }

  onError(error: Error): void {
    this.emit('failure', error);
  }

  /** Unblock anything still waiting, rejecting approvals. */
  cancelAll(): void {
    this.answerApproval(false);
    this.resume();
  }
}
