import type { AgentAction } from '@stepwise/shared';

const CODE_BLOCK_RE = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/;
const RAW_PREVIEW_CHARS = 200;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** The JSON text inside a fenced block, else the outermost braces. */
export function extractJson(response: string): string | null {
  const block = CODE_BLOCK_RE.exec(response);
  if (block?.[1]) return block[1];

  const start = response.indexOf('{');
  const end = response.lastIndexOf('}');
  return start !== -1 && end > start ? response.slice(start, end + 1) : null;
}

function pick(data: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    if (data[key] !== undefined) return data[key];
  }
  return undefined;
}

function unparsed(response: string): AgentAction {
  return {
    toolName: null,
    toolArgs: {},
    isComplete: false,
    result: null,
    thoughts: `Failed to parse model response as JSON: ${response.slice(0, RAW_PREVIEW_CHARS)}`,
  };
}

/**
 * Parse a model response into the next action. Both snake_case and
 * camelCase keys are accepted. Anything unparseable becomes a non-terminal
 * action whose thoughts carry the raw text, so the loop simply moves on.
 */
export function parseAction(response: string): AgentAction {
  const json = extractJson(response);
  if (json === null) return unparsed(response);

  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch {
    return unparsed(response);
  }
  if (!isRecord(data)) return unparsed(response);

  const toolName = pick(data, 'tool_name', 'toolName', 'tool');
  const toolArgs = pick(data, 'tool_args', 'toolArgs', 'args', 'parameters');
  const isComplete = pick(data, 'is_complete', 'isComplete');
  const result = data['result'];
  const thoughts = data['thoughts'];

  return {
    toolName: typeof toolName === 'string' && toolName.trim() ? toolName.trim() : null,
    toolArgs: isRecord(toolArgs) ? toolArgs : {},
    isComplete: isComplete === true || isComplete === 'true',
    result:
      result === undefined || result === null
        ? null
        : typeof result === 'string'
          ? result
          : JSON.stringify(result),
    thoughts: typeof thoughts === 'string' && thoughts ? thoughts : 'No thoughts provided',
  };
}
