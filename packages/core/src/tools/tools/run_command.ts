import { spawn } from 'node:child_process';
import type { ToolImpl, ToolResult, ToolContext } from '../tool.types.js';
import { numberParam, stringParam } from './path.utils.js';

const MAX_OUTPUT_CHARS = 8_000;
const DEFAULT_TIMEOUT_MS = 30_000;
const MAX_TIMEOUT_MS = 120_000;

export interface CommandOutput {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export const runCommandTool: ToolImpl = {
  definition: {
    name: 'run_command',
    description: 'Run a shell command in the working directory and return its exit code and output.',
    parameters: {
      command: {
        type: 'string',
        description: 'Shell command to run.',
        required: true,
      },
      timeout_ms: {
        type: 'number',
        description: `Timeout in milliseconds. Default: ${DEFAULT_TIMEOUT_MS}. Max: ${MAX_TIMEOUT_MS}.`,
        required: false,
      },
    },
  },

  async execute(params: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult> {
    const command = stringParam(params, 'command');
    if (!command) return { success: false, message: 'Missing required parameter: command' };

    const timeoutMs = Math.min(
      Math.max(numberParam(params, 'timeout_ms') ?? DEFAULT_TIMEOUT_MS, 0),
      MAX_TIMEOUT_MS,
    );

    return new Promise<ToolResult>((resolve) => {
      const proc = spawn(command, { shell: true, cwd: ctx.workingDirectory });
      let stdout = '';
      let stderr = '';
      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        proc.kill('SIGKILL');
      }, timeoutMs);

      proc.stdout.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      proc.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      let finished = false;
      const finish = (code: number | null) => {
        if (finished) return;
        finished = true;
        clearTimeout(timer);

        const data: CommandOutput = {
          exitCode: code,
          stdout: truncateOutput(stdout),
          stderr: truncateOutput(stderr),
        };
        if (timedOut) {
          resolve({ success: false, message: `Command timed out after ${timeoutMs}ms`, data });
        } else if (code !== 0) {
          resolve({ success: false, message: `Command exited with code ${code}`, data });
        } else {
          resolve({ success: true, message: 'Command completed', data });
        }
      };

      // After a kill, grandchildren can hold the pipes open, so don't wait for 'close'.
      proc.on('exit', (code) => {
        if (timedOut) finish(code);
      });
      proc.on('close', (code) => finish(code));

      proc.on('error', (err) => {
        if (finished) return;
        finished = true;
        clearTimeout(timer);
        resolve({ success: false, message: err.message });
      });
    });
  },
};

function truncateOutput(output: string): string {
  if (output.length <= MAX_OUTPUT_CHARS) return output;
  const HEAD = 2_000;
  const TAIL = MAX_OUTPUT_CHARS - HEAD;
  const omitted = output.length - HEAD - TAIL;
  return `${output.slice(0, HEAD)}\n[... ${omitted} chars omitted ...]\n${output.slice(-TAIL)}`;
}
