/** Missing collaborator or invalid configuration. Fatal. */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export class UnknownToolError extends Error {
  constructor(readonly toolName: string) {
    super(`Unknown tool: "${toolName}"`);
    this.name = 'UnknownToolError';
  }
}

/** A tool threw instead of returning a failed result. */
export class ToolExecutionError extends Error {
  constructor(
    readonly toolName: string,
    options?: { cause?: unknown },
  ) {
    const reason =
      options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? '');
    super(`Tool "${toolName}" failed: ${reason}`, options);
    this.name = 'ToolExecutionError';
  }
}

export class IterationLimitExceededError extends Error {
  constructor(readonly maxIterations: number) {
    super(`Maximum iterations reached (${maxIterations})`);
    this.name = 'IterationLimitExceededError';
  }
}

export class OracleCallError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OracleCallError';
  }
}

/** The caller aborted the task while the model was being asked. */
export class TaskAbortedError extends Error {
  constructor(options?: { cause?: unknown }) {
    super('Task aborted', options);
    this.name = 'TaskAbortedError';
  }
}
