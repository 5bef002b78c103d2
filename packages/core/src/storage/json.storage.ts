import fs from 'node:fs/promises';
import path from 'node:path';
import type {
  Checkpoint,
  RelatedTask,
  TaskMessage,
  TaskSearchHit,
  TaskStateSnapshot,
} from '@stepwise/shared';
import {
  CheckpointNotFoundError,
  NoStateError,
  type StateStorage,
  type StorageOptions,
} from './storage.types.js';
import {
  DEFAULT_RELATED_LIMIT,
  DEFAULT_SEARCH_LIMIT,
  checkpointId,
  checkpointSeq,
  compareCheckpoints,
  contextSimilarity,
  messageRelevance,
  rankByRelevance,
} from './storage.utils.js';

type StoredState = Omit<TaskStateSnapshot, 'messages' | 'context'>;

const MESSAGES_SUFFIX = '_messages.json';

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function readJson<T>(file: string): Promise<T | null> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
  return JSON.parse(raw);
}

async function writeJson(file: string, value: unknown): Promise<void> {
  await fs.writeFile(file, JSON.stringify(value, null, 2), 'utf8');
}

async function listJson(dir: string): Promise<string[]> {
  try {
    return (await fs.readdir(dir)).filter((name) => name.endsWith('.json'));
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }
}

/**
 * File-per-document storage:
 *
 *   states/<taskId>.json               state without messages and context
 *   states/<taskId>_messages.json      { messages }
 *   context/<taskId>_context.json      { context }
 *   checkpoints/<checkpointId>.json    one checkpoint
 */
export class JsonStateStorage implements StateStorage {
  private readonly statesDir: string;
  private readonly contextDir: string;
  private readonly checkpointsDir: string;
  private readonly now: () => number;

  constructor(baseDir: string, options: StorageOptions = {}) {
    this.statesDir = path.join(baseDir, 'states');
    this.contextDir = path.join(baseDir, 'context');
    this.checkpointsDir = path.join(baseDir, 'checkpoints');
    this.now = options.now ?? Date.now;
  }

  async saveState(taskId: string, state: TaskStateSnapshot): Promise<void> {
    await this.ensureDirs();
    const { messages, context, ...rest } = state;
    await writeJson(this.statePath(taskId), rest);
    await writeJson(this.messagesPath(taskId), { messages });
    await writeJson(this.contextPath(taskId), { context });
  }

  async loadState(taskId: string): Promise<TaskStateSnapshot | null> {
    const stored = await readJson<StoredState>(this.statePath(taskId));
    if (!stored) return null;
    const messages = await readJson<{ messages: TaskMessage[] }>(this.messagesPath(taskId));
    const context = await readJson<{ context: Record<string, unknown> }>(
      this.contextPath(taskId),
    );
    return {
      ...stored,
      messages: messages?.messages ?? [],
      context: context?.context ?? {},
    };
  }

  async createCheckpoint(taskId: string, description: string): Promise<Checkpoint> {
    const state = await this.loadState(taskId);
    if (!state) throw new NoStateError(taskId);

    const existing = await this.listCheckpoints(taskId);
    const last = existing.reduce<Checkpoint | null>(
      (latest, c) => (latest && checkpointSeq(latest.id) >= checkpointSeq(c.id) ? latest : c),
      null,
    );
    const seq = (last ? checkpointSeq(last.id) : 0) + 1;

    const checkpoint: Checkpoint = {
      id: checkpointId(taskId, seq),
      timestamp: this.now(),
      taskId,
      description,
      state,
      parentId: last?.id ?? null,
    };
    await writeJson(this.checkpointPath(checkpoint.id), checkpoint);
    return checkpoint;
  }

  async restoreCheckpoint(id: string): Promise<TaskStateSnapshot> {
    const checkpoint = await readJson<Checkpoint>(this.checkpointPath(id));
    if (!checkpoint) throw new CheckpointNotFoundError(id);
    await this.saveState(checkpoint.taskId, checkpoint.state);
    return checkpoint.state;
  }

  async listCheckpoints(taskId: string): Promise<Checkpoint[]> {
    const checkpoints: Checkpoint[] = [];
    for (const name of await listJson(this.checkpointsDir)) {
      const checkpoint = await readJson<Checkpoint>(path.join(this.checkpointsDir, name));
      if (checkpoint?.taskId === taskId) checkpoints.push(checkpoint);
    }
    return checkpoints.sort(compareCheckpoints);
  }

  async searchTaskHistory(query: string, limit = DEFAULT_SEARCH_LIMIT): Promise<TaskSearchHit[]> {
    const hits: TaskSearchHit[] = [];
    for (const name of await listJson(this.statesDir)) {
      if (!name.endsWith(MESSAGES_SUFFIX)) continue;
      const taskId = name.slice(0, -MESSAGES_SUFFIX.length);
      const doc = await readJson<{ messages: TaskMessage[] }>(path.join(this.statesDir, name));
      hits.push({ taskId, relevance: messageRelevance(doc?.messages ?? [], query) });
    }
    return rankByRelevance(hits, limit);
  }

  async getRelatedTasks(taskId: string, limit = DEFAULT_RELATED_LIMIT): Promise<RelatedTask[]> {
    const own = await readJson<{ context: Record<string, unknown> }>(this.contextPath(taskId));
    if (!own || Object.keys(own.context).length === 0) return [];

    const related: RelatedTask[] = [];
    for (const name of await listJson(this.contextDir)) {
      const otherId = name.slice(0, -'_context.json'.length);
      if (otherId === taskId) continue;
      const other = await readJson<{ context: Record<string, unknown> }>(
        path.join(this.contextDir, name),
      );
      const relevance = contextSimilarity(own.context, other?.context ?? {});
      if (relevance === 0) continue;
      const state = await readJson<StoredState>(this.statePath(otherId));
      related.push({
        taskId: otherId,
        description: state?.task ?? '',
        relevance,
        completed: state?.isComplete ?? false,
      });
    }
    return rankByRelevance(related, limit);
  }

  async close(): Promise<void> {
    // Nothing held open between calls.
  }

  private async ensureDirs(): Promise<void> {
    await fs.mkdir(this.statesDir, { recursive: true });
    await fs.mkdir(this.contextDir, { recursive: true });
    await fs.mkdir(this.checkpointsDir, { recursive: true });
  }

  private statePath(taskId: string): string {
    return path.join(this.statesDir, `${taskId}.json`);
  }

  private messagesPath(taskId: string): string {
    return path.join(this.statesDir, `${taskId}${MESSAGES_SUFFIX}`);
  }

  private contextPath(taskId: string): string {
    return path.join(this.contextDir, `${taskId}_context.json`);
  }

  private checkpointPath(id: string): string {
    return path.join(this.checkpointsDir, `${id}.json`);
  }
}
