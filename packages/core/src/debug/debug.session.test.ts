import { describe, it, expect } from 'vitest';
import { DebugSession } from './debug.session.js';

describe('DebugSession', () => {
  it('never breaks while inactive', () => {
    const session = new DebugSession({ stepByStep: true });
    expect(session.shouldBreak('llm', {})).toBe(false);
  });

  it('breaks at every point in step-by-step mode', () => {
    const session = new DebugSession({ stepByStep: true, now: () => 42 });
    session.start();
    expect(session.startTime).toBe(42);
    expect(session.shouldBreak('llm', {})).toBe(true);
    expect(session.shouldBreak('tool', {})).toBe(true);
    expect(session.shouldBreak('state', {})).toBe(true);
  });

  it('matches unconditional breakpoints by kind only', () => {
    const session = new DebugSession({ breakpoints: { tools: { type: 'tool' } } });
    session.start();
    expect(session.shouldBreak('tool', {})).toBe(true);
    expect(session.shouldBreak('state', {})).toBe(false);
  });

  it('evaluates conditions against the context', () => {
    const session = new DebugSession();
    session.addBreakpoint('writes', { type: 'tool', condition: 'toolName == "write_file"' });
    session.start();

    expect(session.shouldBreak('tool', { toolName: 'write_file' })).toBe(true);
    expect(session.shouldBreak('tool', { toolName: 'read_file' })).toBe(false);
  });

  it('treats a malformed condition as non-matching', () => {
    const session = new DebugSession({
      breakpoints: {
        broken: { type: 'tool', condition: 'toolName ==' },
        fine: { type: 'tool', condition: 'toolName == "a"' },
      },
    });
    session.start();

    expect(session.shouldBreak('tool', { toolName: 'b' })).toBe(false);
    expect(session.shouldBreak('tool', { toolName: 'a' })).toBe(true);
  });

  it('skips disabled breakpoints and can toggle or remove them', () => {
    const session = new DebugSession({ breakpoints: { all: { type: 'llm', enabled: false } } });
    session.start();
    expect(session.shouldBreak('llm', {})).toBe(false);

    expect(session.setEnabled('all', true)).toBe(true);
    expect(session.shouldBreak('llm', {})).toBe(true);

    expect(session.removeBreakpoint('all')).toBe(true);
    expect(session.shouldBreak('llm', {})).toBe(false);
    expect(session.setEnabled('all', true)).toBe(false);
  });

  it('stop() deactivates the session', () => {
    const session = new DebugSession({ stepByStep: true });
    session.start();
    session.stop();
    expect(session.active).toBe(false);
    expect(session.shouldBreak('tool', {})).toBe(false);
  });
});
