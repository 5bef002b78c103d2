import { describe, it, expect } from 'vitest';
import { parseCliArgs } from './args.js';

describe('parseCliArgs', () => {
  it('reads the config path and joins the task words', () => {
    expect(parseCliArgs(['--config', 'cfg.yaml', 'fix', 'the', 'build'])).toEqual({
      configPath: 'cfg.yaml',
      task: 'fix the build',
      help: false,
    });
  });

  it('accepts the short config flag', () => {
    expect(parseCliArgs(['-c', 'other.yaml']).configPath).toBe('other.yaml');
  });

  it('leaves task and config unset when absent', () => {
    expect(parseCliArgs([])).toEqual({ configPath: undefined, task: undefined, help: false });
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow();
  });
});
