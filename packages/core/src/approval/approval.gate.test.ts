import { describe, it, expect, vi, afterEach } from 'vitest';
import { ApprovalGate, type ApprovalCallback, type ApprovalPolicy } from './approval.gate.js';
import { TaskState } from '../state/task.state.js';

function callbackReturning(...answers: boolean[]) {
  const getApproval = vi.fn(async () => answers.shift() ?? false);
  return { getApproval } satisfies ApprovalCallback;
}

const policy = (overrides: Partial<ApprovalPolicy> = {}): ApprovalPolicy => ({
  autoApprove: false,
  maxConsecutiveAutoApprovals: 3,
  timeoutMs: 0,
  ...overrides,
});

afterEach(() => {
  vi.useRealTimers();
});

describe('ApprovalGate', () => {
  it('asks for every call when auto-approval is off', async () => {
    const callback = callbackReturning(true, true);
    const gate = new ApprovalGate(callback, policy());
    const state = new TaskState();

    expect(await gate.authorize(state, 'echo', { x: 1 }, 'why')).toBe('granted');
    expect(await gate.authorize(state, 'echo', {})).toBe('granted');
    expect(callback.getApproval).toHaveBeenCalledTimes(2);
    expect(callback.getApproval).toHaveBeenNthCalledWith(1, 'echo', { x: 1 }, 'why');
  });

  it('auto-approves up to the streak limit, then asks and resets on grant', async () => {
    const callback = callbackReturning(true);
    const gate = new ApprovalGate(callback, policy({ autoApprove: true, maxConsecutiveAutoApprovals: 2 }));
    const state = new TaskState();

    expect(await gate.authorize(state, 't', {})).toBe('auto');
    expect(await gate.authorize(state, 't', {})).toBe('auto');
    expect(state.consecutiveAutoApprovals).toBe(2);

    expect(await gate.authorize(state, 't', {})).toBe('granted');
    expect(state.consecutiveAutoApprovals).toBe(0);
    expect(callback.getApproval).toHaveBeenCalledTimes(1);

    expect(await gate.authorize(state, 't', {})).toBe('auto');
  });

  it('leaves the streak unchanged on rejection', async () => {
    const callback = callbackReturning(false);
    const gate = new ApprovalGate(callback, policy({ autoApprove: true, maxConsecutiveAutoApprovals: 1 }));
    const state = new TaskState();

    await gate.authorize(state, 't', {});
    expect(await gate.authorize(state, 't', {})).toBe('rejected');
    expect(state.consecutiveAutoApprovals).toBe(1);
  });

  it('always asks when the streak limit is zero', async () => {
    const callback = callbackReturning(true);
    const gate = new ApprovalGate(callback, policy({ autoApprove: true, maxConsecutiveAutoApprovals: 0 }));

    expect(await gate.authorize(new TaskState(), 't', {})).toBe('granted');
    expect(callback.getApproval).toHaveBeenCalledTimes(1);
  });

  it('treats an unanswered request as rejected after the timeout', async () => {
    vi.useFakeTimers();
    const callback: ApprovalCallback = { getApproval: () => new Promise<boolean>(() => {}) };
    const gate = new ApprovalGate(callback, policy({ timeoutMs: 5_000 }));

    const decision = gate.authorize(new TaskState(), 't', {});
    await vi.advanceTimersByTimeAsync(5_000);

    expect(await decision).toBe('rejected');
  });

  it('withdraws the request from the callback when it times out', async () => {
    vi.useFakeTimers();
    const withdrawApproval = vi.fn();
    const callback: ApprovalCallback = {
      getApproval: () => new Promise<boolean>(() => {}),
      withdrawApproval,
    };
    const gate = new ApprovalGate(callback, policy({ timeoutMs: 2_000 }));

    const decision = gate.authorize(new TaskState(), 't', {});
    await vi.advanceTimersByTimeAsync(1_999);
    expect(withdrawApproval).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);

    expect(await decision).toBe('rejected');
    expect(withdrawApproval).toHaveBeenCalledTimes(1);
  });

  it('does not withdraw an answered request', async () => {
    vi.useFakeTimers();
    const withdrawApproval = vi.fn();
    const gate = new ApprovalGate(
      { getApproval: async () => true, withdrawApproval },
      policy({ timeoutMs: 2_000 }),
    );

    expect(await gate.authorize(new TaskState(), 't', {})).toBe('granted');
    await vi.advanceTimersByTimeAsync(5_000);
    expect(withdrawApproval).not.toHaveBeenCalled();
  });

  it('propagates a failing callback', async () => {
    const callback: ApprovalCallback = {
      getApproval: () => Promise.reject(new Error('ui closed')),
    };
    const gate = new ApprovalGate(callback, policy({ timeoutMs: 1_000 }));

    await expect(gate.authorize(new TaskState(), 't', {})).rejects.toThrow('ui closed');
  });
});
