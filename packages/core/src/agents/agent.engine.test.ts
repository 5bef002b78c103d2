import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { AgentAction, DebugInfo, EngineStatus } from '@stepwise/shared';
import { AgentEngine, type DebugCallback, type EngineConfig } from './agent.engine.js';
import type { Oracle } from './llm.oracle.js';
import {
  ConfigurationError,
  IterationLimitExceededError,
  UnknownToolError,
} from './agent.errors.js';
import type { ApprovalCallback } from '../approval/approval.gate.js';
import { DEFAULT_CONFIG } from '../config/config.defaults.js';
import { RateLimiter } from '../ratelimit/rate.limiter.js';
import { SqliteStateStorage } from '../storage/sqlite.storage.js';
import type { StateStorage } from '../storage/storage.types.js';
import { ToolRegistry } from '../tools/tool.registry.js';
import type { ToolImpl } from '../tools/tool.types.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function toolCall(toolName: string, toolArgs: Record<string, unknown> = {}): AgentAction {
  return { toolName, toolArgs, isComplete: false, result: null, thoughts: `call ${toolName}` };
}

function completion(result: string | null, thoughts = 'done'): AgentAction {
  return { toolName: null, toolArgs: {}, isComplete: true, result, thoughts };
}

const idle: AgentAction = {
  toolName: null,
  toolArgs: {},
  isComplete: false,
  result: null,
  thoughts: 'thinking it over',
};

/** Replays actions in order, then keeps answering with a no-op. */
class ScriptedOracle implements Oracle {
  calls = 0;

  constructor(private readonly actions: AgentAction[]) {}

  async getNextAction(): Promise<AgentAction> {
    this.calls++;
    return this.actions.shift() ?? idle;
  }
}

function makeEchoTool() {
  const executed: Record<string, unknown>[] = [];
  const tool: ToolImpl = {
    definition: {
      name: 'echo',
      description: 'Echo the arguments back',
      parameters: { x: { type: 'number', description: 'value', required: false } },
    },
    async execute(params) {
      executed.push(params);
      return { success: true, message: 'echoed', data: params };
    },
  };
  return { tool, executed };
}

function approvals(...answers: boolean[]) {
  const calls: Array<[string, Record<string, unknown>, string | undefined]> = [];
  const callback: ApprovalCallback = {
    async getApproval(toolName, args, description) {
      calls.push([toolName, args, description]);
      return answers.shift() ?? true;
    },
  };
  return { callback, calls };
}

function makeConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return { ...DEFAULT_CONFIG, working_directory: '/tmp', auto_approve_tools: true, ...overrides };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('AgentEngine', () => {
  let storage: SqliteStateStorage;
  let echo: ReturnType<typeof makeEchoTool>;

  beforeEach(() => {
    storage = new SqliteStateStorage({ databasePath: ':memory:' });
    echo = makeEchoTool();
  });

  afterEach(async () => {
    await storage.close();
  });

  function makeEngine(
    oracle: Oracle | null,
    options: { config?: EngineConfig; approval?: ApprovalCallback; storage?: StateStorage } = {},
  ): AgentEngine {
    return new AgentEngine({
      config: options.config ?? makeConfig(),
      oracle,
      storage: options.storage ?? storage,
      approval: options.approval ?? approvals().callback,
      rateLimiter: new RateLimiter({ rpm: 1000 }),
      tools: new ToolRegistry([echo.tool]),
    });
  }

  it('returns the result of an immediate completion', async () => {
    const engine = makeEngine(new ScriptedOracle([completion('R1')]));

    const result = await engine.executeTask('say R1');

    expect(result).toBe('R1');
    expect(engine.state.isComplete).toBe(true);
    expect(engine.state.isFailed).toBe(false);
    expect(engine.state.messages.map((m) => [m.role, m.content])).toEqual([
      ['system', 'Starting task: say R1'],
      ['assistant', 'done'],
      ['system', 'Task completed: R1'],
    ]);
    expect(engine.state.messages[2]?.metadata).toEqual({ result: 'R1' });

    const stored = await storage.loadState(engine.taskId);
    expect(stored?.isComplete).toBe(true);
    expect(stored?.messages).toHaveLength(3);
  });

  it('falls back to the thoughts when a completion has no result', async () => {
    const engine = makeEngine(new ScriptedOracle([completion(null, 'all good')]));
    expect(await engine.executeTask('check')).toBe('all good');
  });

  it('executes a tool call before completing', async () => {
    const engine = makeEngine(new ScriptedOracle([toolCall('echo', { x: 1 }), completion('ok')]));
    const recorded: string[] = [];
    engine.on('tool', (record) => recorded.push(record.toolName));

    await engine.executeTask('echo one');

    expect(engine.state.toolExecutions).toHaveLength(1);
    expect(engine.state.toolExecutions[0]?.args).toEqual({ x: 1 });
    expect(engine.state.toolExecutions[0]?.result).toEqual({
      success: true,
      message: 'echoed',
      data: { x: 1 },
    });
    expect(echo.executed).toEqual([{ x: 1 }]);
    expect(recorded).toEqual(['echo']);

    const checkpoints = await engine.listCheckpoints();
    expect(checkpoints.map((c) => c.description)).toEqual(['After executing tool: echo']);
    expect(checkpoints[0]?.id).toBe(`${engine.taskId}_1`);
  });

  it('skips a rejected tool call and runs the next approved one', async () => {
    const { callback, calls } = approvals(false, true);
    const engine = makeEngine(
      new ScriptedOracle([toolCall('echo', { x: 1 }), toolCall('echo', { x: 2 }), completion('ok')]),
      { config: makeConfig({ auto_approve_tools: false }), approval: callback },
    );

    await engine.executeTask('echo twice');

    expect(calls).toEqual([
      ['echo', { x: 1 }, 'call echo'],
      ['echo', { x: 2 }, 'call echo'],
    ]);
    expect(echo.executed).toEqual([{ x: 2 }]);
    expect(engine.state.toolExecutions.map((e) => e.args)).toEqual([{ x: 2 }]);
  });

  it('asks for approval once the auto-approval streak is used up', async () => {
    const { callback, calls } = approvals(true);
    const engine = makeEngine(
      new ScriptedOracle([toolCall('echo'), toolCall('echo'), toolCall('echo'), completion('ok')]),
      { config: makeConfig({ max_consecutive_auto_approvals: 2 }), approval: callback },
    );

    await engine.executeTask('echo thrice');

    expect(calls).toHaveLength(1);
    expect(echo.executed).toHaveLength(3);
    expect(engine.state.consecutiveAutoApprovals).toBe(0);
  });

  it('fails after exactly max_iterations oracle calls', async () => {
    const oracle = new ScriptedOracle([]);
    const engine = makeEngine(oracle, { config: makeConfig({ max_iterations: 3 }) });

    await expect(engine.executeTask('never ends')).rejects.toThrow(IterationLimitExceededError);

    expect(oracle.calls).toBe(3);
    expect(engine.state.isFailed).toBe(true);
    expect(engine.state.isComplete).toBe(true);
    expect(engine.state.errorMessage).toBe('Maximum iterations reached');
    const stored = await storage.loadState(engine.taskId);
    expect(stored?.isFailed).toBe(true);
    expect(stored?.errorMessage).toBe('Maximum iterations reached');
  });

  it('fails the task on an unknown tool', async () => {
    const engine = makeEngine(new ScriptedOracle([toolCall('nope')]));

    await expect(engine.executeTask('use a missing tool')).rejects.toThrow(UnknownToolError);

    expect(engine.state.isFailed).toBe(true);
    expect(engine.state.errorMessage).toBe('Unknown tool: "nope"');
    expect(engine.status.status).toBe('failed');
  });

  it('records a throwing tool as a failed result and carries on', async () => {
    const engine = makeEngine(new ScriptedOracle([toolCall('explode'), completion('ok')]));
    engine.registerTool({
      definition: { name: 'explode', description: 'Always throws', parameters: {} },
      async execute() {
        throw new Error('kaboom');
      },
    });

    expect(await engine.executeTask('explode')).toBe('ok');
    expect(engine.state.getLastToolResult()).toEqual({
      success: false,
      message: 'Tool "explode" failed: kaboom',
    });
  });

  it('refuses to run without an oracle', async () => {
    const engine = makeEngine(null);
    await expect(engine.executeTask('anything')).rejects.toThrow(ConfigurationError);
  });

  it('gives every task a fresh id', async () => {
    const engine = makeEngine(new ScriptedOracle([completion('a'), completion('b')]));

    await engine.executeTask('first');
    const firstId = engine.taskId;
    await engine.executeTask('second');

    expect(firstId).not.toBe('');
    expect(engine.taskId).not.toBe(firstId);
  });

  it('emits status transitions', async () => {
    const engine = makeEngine(new ScriptedOracle([toolCall('echo'), completion('ok')]));
    const statuses: EngineStatus[] = [];
    engine.on('status', (s) => statuses.push(s.status));

    await engine.executeTask('echo');

    expect(statuses).toEqual([
      'thinking',
      'awaiting_approval',
      'acting',
      'thinking',
      'complete',
    ]);
  });

  // -------------------------------------------------------------------------
  // Checkpoints
  // -------------------------------------------------------------------------

  it('stops checkpointing at max_checkpoints', async () => {
    const config = makeConfig({
      max_consecutive_auto_approvals: 10,
      state_storage: { ...DEFAULT_CONFIG.state_storage, max_checkpoints: 2 },
    });
    const engine = makeEngine(
      new ScriptedOracle([toolCall('echo'), toolCall('echo'), toolCall('echo'), completion('ok')]),
      { config },
    );

    await engine.executeTask('echo thrice');

    expect(echo.executed).toHaveLength(3);
    expect(await engine.listCheckpoints()).toHaveLength(2);
    expect(await engine.createCheckpoint('manual')).toBeNull();
    expect(await engine.listCheckpoints()).toHaveLength(2);
  });

  it('does not checkpoint when auto_checkpoint is off', async () => {
    const config = makeConfig({
      state_storage: { ...DEFAULT_CONFIG.state_storage, auto_checkpoint: false },
    });
    const engine = makeEngine(new ScriptedOracle([toolCall('echo'), completion('ok')]), { config });

    await engine.executeTask('echo');

    expect(await engine.listCheckpoints()).toEqual([]);
  });

  it('keeps going when a checkpoint cannot be written', async () => {
    class BrokenCheckpoints extends SqliteStateStorage {
      override async createCheckpoint(): Promise<never> {
        throw new Error('disk full');
      }
    }
    const broken = new BrokenCheckpoints({ databasePath: ':memory:' });
    const engine = makeEngine(new ScriptedOracle([toolCall('echo', { x: 1 }), completion('ok')]), {
      storage: broken,
    });

    const result = await engine.executeTask('echo despite checkpoints');

    expect(result).toBe('ok');
    expect(engine.state.isComplete).toBe(true);
    expect(engine.state.toolExecutions.map((r) => r.toolName)).toEqual(['echo']);
    expect(await engine.createCheckpoint('manual')).toBeNull();
    expect(await engine.listCheckpoints()).toEqual([]);
    await broken.close();
  });

  it('restores a checkpoint of the current task into the live state', async () => {
    const engine = makeEngine(new ScriptedOracle([toolCall('echo', { x: 1 }), completion('ok')]));
    await engine.executeTask('echo');

    const snapshot = await engine.restoreCheckpoint(`${engine.taskId}_1`);

    expect(snapshot.isComplete).toBe(false);
    expect(engine.state.isComplete).toBe(false);
    expect(engine.state.toolExecutions).toHaveLength(1);
    expect((await storage.loadState(engine.taskId))?.isComplete).toBe(false);
  });

  // -------------------------------------------------------------------------
  // History and related tasks
  // -------------------------------------------------------------------------

  it('searches stored task history', async () => {
    const engine = makeEngine(new ScriptedOracle([completion('R1')]));
    await engine.executeTask('first task');

    expect(await engine.searchTaskHistory('starting')).toEqual([
      { taskId: engine.taskId, relevance: 1, task: 'first task', completed: true },
    ]);
  });

  it('links tasks that share context', async () => {
    const engine = makeEngine(new ScriptedOracle([completion('a'), completion('b')]));
    await engine.updateContext({ repo: 'demo' });

    await engine.executeTask('first');
    const firstId = engine.taskId;
    await engine.executeTask('second');

    expect(engine.state.context).toEqual({ repo: 'demo' });
    expect(engine.state.relatedTasks).toEqual([
      { taskId: firstId, description: 'first', relevance: 1, completed: true },
    ]);
    expect(await engine.getRelatedTasks()).toEqual(engine.state.relatedTasks);
  });

  it('persists user inputs with the task', async () => {
    const engine = makeEngine(new ScriptedOracle([completion('ok')]));
    await engine.executeTask('note');
    await engine.saveUserInput('remember the tests');

    const stored = await storage.loadState(engine.taskId);
    expect(stored?.userInputs.map((u) => u.content)).toEqual(['remember the tests']);
  });

  // -------------------------------------------------------------------------
  // Debugging
  // -------------------------------------------------------------------------

  function recordingDebugger() {
    const breaks: DebugInfo[] = [];
    const steps: DebugInfo[] = [];
    const errors: string[] = [];
    const callback: DebugCallback = {
      onBreak: (info) => {
        breaks.push(info);
      },
      onStep: (info) => {
        steps.push(info);
      },
      onError: (error) => {
        errors.push(error.message);
      },
    };
    return { callback, breaks, steps, errors };
  }

  it('breaks before every oracle and tool call in step-by-step mode', async () => {
    const config = makeConfig({ debug: { enabled: true, step_by_step: true, breakpoints: {} } });
    const engine = makeEngine(new ScriptedOracle([toolCall('echo'), completion('ok')]), { config });
    const dbg = recordingDebugger();

    await engine.executeTask('step through', dbg.callback);

    expect(dbg.breaks.map((b) => b.action)).toEqual(['llm', 'tool', 'state', 'llm']);
    expect(dbg.steps).toHaveLength(4);
    expect(engine.debugSession.active).toBe(false);
  });

  it('breaks only where a conditional breakpoint matches', async () => {
    const config = makeConfig({
      debug: {
        enabled: true,
        step_by_step: false,
        breakpoints: { second: { type: 'tool', condition: 'args.x == 2' } },
      },
    });
    const engine = makeEngine(
      new ScriptedOracle([toolCall('echo', { x: 1 }), toolCall('echo', { x: 2 }), completion('ok')]),
      { config },
    );
    const dbg = recordingDebugger();

    await engine.executeTask('echo twice', dbg.callback);

    expect(dbg.breaks).toHaveLength(1);
    expect(dbg.breaks[0]?.action).toBe('tool');
    expect(dbg.breaks[0]?.details['args']).toEqual({ x: 2 });
    expect(dbg.steps).toEqual([]);
  });

  it('ignores breakpoints while debugging is disabled', async () => {
    const config = makeConfig({ debug: { enabled: false, step_by_step: true, breakpoints: {} } });
    const engine = makeEngine(new ScriptedOracle([toolCall('echo'), completion('ok')]), { config });
    const dbg = recordingDebugger();

    await engine.executeTask('no debugging', dbg.callback);

    expect(dbg.breaks).toEqual([]);
  });

  it('reports fatal errors to the debugger', async () => {
    const config = makeConfig({ debug: { enabled: true, step_by_step: false, breakpoints: {} } });
    const engine = makeEngine(new ScriptedOracle([toolCall('nope')]), { config });
    const dbg = recordingDebugger();

    await expect(engine.executeTask('fail', dbg.callback)).rejects.toThrow(UnknownToolError);

    expect(dbg.errors).toEqual(['Unknown tool: "nope"']);
    expect(engine.debugSession.active).toBe(false);
  });
});
