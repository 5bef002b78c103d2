import type { ToolDefinition } from '../tools/tool.types.js';
import type { TaskState } from '../state/task.state.js';

const MAX_RESULT_CHARS = 1_000;

/**
 * Render a list of tool definitions as a compact markdown description
 * the model can use to understand what tools are available.
 */
export function buildToolsDescription(tools: ToolDefinition[]): string {
  if (tools.length === 0) return '';

  return tools
    .map((tool) => {
      const params = Object.entries(tool.parameters)
        .map(
          ([name, p]) =>
            `    - ${name} (${p.type}${p.required ? ', required' : ''}): ${p.description}`,
        )
        .join('\n');
      return `### ${tool.name}\n${tool.description}\nParameters:\n${params || '    (none)'}`;
    })
    .join('\n\n');
}

const RESPONSE_FORMAT = `\
## Response Format
Reply with exactly one JSON object in a \`\`\`json fenced block.

To call a tool:
\`\`\`json
{
  "thoughts": "why this tool, and what you expect",
  "tool_name": "<tool name>",
  "tool_args": { "param": "value" },
  "is_complete": false
}
\`\`\`

When the task is done:
\`\`\`json
{
  "thoughts": "final analysis",
  "is_complete": true,
  "result": "what was accomplished"
}
\`\`\`

Rules:
- One action per reply; the tool result arrives in the next turn
- Every tool returns { success, message, data }; check success before relying on data
- Mark the task complete only when every objective is met`;

export function buildSystemPrompt(tools: ToolDefinition[]): string {
  const intro =
    'You are an autonomous software assistant. You work toward the task one step at a time ' +
    'using the tools below.';
  const toolsDesc = buildToolsDescription(tools);
  const toolSection = toolsDesc ? `## Available Tools\n\n${toolsDesc}` : '## Available Tools\n\n(none)';
  return `${intro}\n\n${toolSection}\n\n${RESPONSE_FORMAT}`;
}

function truncate(text: string): string {
  return text.length > MAX_RESULT_CHARS ? `${text.slice(0, MAX_RESULT_CHARS)}…` : text;
}

export function formatToolHistory(state: TaskState): string {
  if (state.toolExecutions.length === 0) return '(no tools executed yet)';
  return state.toolExecutions
    .map((exec, i) => {
      const status = exec.result.success ? 'ok' : 'failed';
      const data =
        exec.result.data === undefined
          ? ''
          : `\n   data: ${truncate(typeof exec.result.data === 'string' ? exec.result.data : JSON.stringify(exec.result.data))}`;
      return `${i + 1}. ${exec.toolName} ${JSON.stringify(exec.args)} -> ${status}: ${exec.result.message}${data}`;
    })
    .join('\n');
}

/** The per-iteration user prompt: task, progress so far, and what is known. */
export function buildTaskPrompt(task: string, state: TaskState): string {
  const duration = state.getTaskDuration() ?? 0;
  const sections = [
    `## Task\n${task}`,
    `## Current State\nElapsed: ${duration.toFixed(2)}s\nStatus: ${state.isComplete ? 'Complete' : 'In Progress'}`,
    `## Tool Execution History\n${formatToolHistory(state)}`,
  ];

  const contextKeys = Object.keys(state.context);
  if (contextKeys.length > 0) {
    sections.push(`## Context\n${truncate(JSON.stringify(state.context, null, 2))}`);
  }
  if (state.userInputs.length > 0) {
    sections.push(`## User Notes\n${state.userInputs.map((u) => `- ${u.content}`).join('\n')}`);
  }
  if (state.relatedTasks.length > 0) {
    sections.push(
      `## Related Past Tasks\n${state.relatedTasks
        .map((t) => `- ${t.description} (${t.completed ? 'completed' : 'not completed'})`)
        .join('\n')}`,
    );
  }

  return `${sections.join('\n\n')}\n\nWhat is the next step?`;
}
