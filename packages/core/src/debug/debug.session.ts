import type { Logger } from 'pino';
import type { BreakpointConfig, BreakpointKind } from '@stepwise/shared';
import { silentLogger } from '../logging/logger.js';
import { matchesCondition } from './breakpoint.condition.js';

export interface Breakpoint {
  type: BreakpointKind;
  condition: string | null;
  enabled: boolean;
}

export interface DebugSessionOptions {
  stepByStep?: boolean;
  breakpoints?: Record<string, BreakpointConfig>;
  logger?: Logger;
  now?: () => number;
}

/** Decides whether the engine pauses at a tool, state or llm interception point. */
export class DebugSession {
  active = false;
  stepByStep: boolean;
  startTime: number | null = null;
  readonly breakpoints = new Map<string, Breakpoint>();
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: DebugSessionOptions = {}) {
    this.stepByStep = options.stepByStep ?? false;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'debug' });
    this.now = options.now ?? Date.now;
    for (const [name, config] of Object.entries(options.breakpoints ?? {})) {
      this.addBreakpoint(name, config);
    }
  }

  start(): void {
    this.active = true;
    this.startTime = this.now();
  }

  stop(): void {
    this.active = false;
  }

  addBreakpoint(name: string, config: BreakpointConfig): void {
    this.breakpoints.set(name, {
      type: config.type,
      condition: config.condition ?? null,
      enabled: config.enabled ?? true,
    });
  }

  removeBreakpoint(name: string): boolean {
    return this.breakpoints.delete(name);
  }

  /** Returns false when no breakpoint has that name. */
  setEnabled(name: string, enabled: boolean): boolean {
    const breakpoint = this.breakpoints.get(name);
    if (!breakpoint) return false;
    breakpoint.enabled = enabled;
    return true;
  }

  shouldBreak(kind: BreakpointKind, context: Record<string, unknown>): boolean {
    if (!this.active) return false;
    if (this.stepByStep) return true;

    for (const [name, breakpoint] of this.breakpoints) {
      if (!breakpoint.enabled || breakpoint.type !== kind) continue;
      if (breakpoint.condition === null) return true;
      try {
        if (matchesCondition(breakpoint.condition, context)) return true;
      } catch (err) {
        this.logger.debug(
          { breakpoint: name, err: err instanceof Error ? err.message : String(err) },
          'breakpoint condition skipped',
        );
      }
    }
    return false;
  }
}
