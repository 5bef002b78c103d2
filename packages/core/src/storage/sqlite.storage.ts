import fs from 'node:fs';
import path from 'node:path';
import type { Database as DatabaseInstance, Statement } from 'better-sqlite3';
import Database from 'better-sqlite3';
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
  contextSimilarity,
  messageRelevance,
  rankByRelevance,
} from './storage.utils.js';

export interface SqliteStateStorageConfig extends StorageOptions {
  databasePath?: string;
  database?: DatabaseInstance;
}

type StoredState = Omit<TaskStateSnapshot, 'messages' | 'context'>;

interface StateRow {
  task_id: string;
  data: string;
}

interface MessageRow {
  task_id: string;
  role: TaskMessage['role'];
  content: string;
  metadata: string;
  timestamp: number;
}

interface ContextRow {
  task_id: string;
  key: string;
  value: string;
}

interface CheckpointRow {
  checkpoint_id: string;
  task_id: string;
  seq: number;
  timestamp: number;
  description: string;
  state: string;
  parent_id: string | null;
}

type PreparedStatements = {
  upsertState: Statement<[string, string, string, number]>;
  getState: Statement<[string], StateRow>;
  getTaskSummary: Statement<[string], { task: string; data: string }>;
  deleteMessages: Statement<[string]>;
  insertMessage: Statement<[string, number, string, string, string, number]>;
  getMessages: Statement<[string], MessageRow>;
  allMessages: Statement<[], Pick<MessageRow, 'task_id' | 'content'>>;
  deleteContext: Statement<[string]>;
  insertContext: Statement<[string, string, string]>;
  getContext: Statement<[string], ContextRow>;
  allContext: Statement<[], ContextRow>;
  insertCheckpoint: Statement<[string, string, number, number, string, string, string | null]>;
  getCheckpoint: Statement<[string], CheckpointRow>;
  listCheckpoints: Statement<[string], CheckpointRow>;
  latestCheckpoint: Statement<[string], CheckpointRow>;
};

function mapCheckpoint(row: CheckpointRow): Checkpoint {
  return {
    id: row.checkpoint_id,
    timestamp: row.timestamp,
    taskId: row.task_id,
    description: row.description,
    state: JSON.parse(row.state),
    parentId: row.parent_id,
  };
}

function groupContext(rows: ContextRow[]): Map<string, Record<string, unknown>> {
  const grouped = new Map<string, Record<string, unknown>>();
  for (const row of rows) {
    const context = grouped.get(row.task_id) ?? {};
    context[row.key] = JSON.parse(row.value);
    grouped.set(row.task_id, context);
  }
  return grouped;
}

/** Relational backend on better-sqlite3: states, messages, context and checkpoints tables. */
export class SqliteStateStorage implements StateStorage {
  private readonly db: DatabaseInstance;
  private readonly statements: PreparedStatements;
  private readonly now: () => number;

  constructor(config: SqliteStateStorageConfig) {
    this.db = config.database ?? this.createDatabase(config.databasePath);
    this.now = config.now ?? Date.now;
    this.initSchema();
    this.statements = this.prepareStatements();
  }

  async saveState(taskId: string, state: TaskStateSnapshot): Promise<void> {
    const { messages, context, ...rest } = state;
    const write = this.db.transaction(() => {
      this.statements.upsertState.run(taskId, state.task, JSON.stringify(rest), this.now());
      this.statements.deleteMessages.run(taskId);
      messages.forEach((m, position) => {
        this.statements.insertMessage.run(
          taskId,
          position,
          m.role,
          m.content,
          JSON.stringify(m.metadata),
          m.timestamp,
        );
      });
      this.statements.deleteContext.run(taskId);
      for (const [key, value] of Object.entries(context)) {
        if (value === undefined) continue;
        this.statements.insertContext.run(taskId, key, JSON.stringify(value));
      }
    });
    write();
  }

  async loadState(taskId: string): Promise<TaskStateSnapshot | null> {
    const row = this.statements.getState.get(taskId);
    if (!row) return null;
    const stored: StoredState = JSON.parse(row.data);
    const messages = this.statements.getMessages.all(taskId).map(
      (m): TaskMessage => ({
        role: m.role,
        content: m.content,
        metadata: JSON.parse(m.metadata),
        timestamp: m.timestamp,
      }),
    );
    const context = groupContext(this.statements.getContext.all(taskId)).get(taskId) ?? {};
    return { ...stored, messages, context };
  }

  async createCheckpoint(taskId: string, description: string): Promise<Checkpoint> {
    const state = await this.loadState(taskId);
    if (!state) throw new NoStateError(taskId);

    const latest = this.statements.latestCheckpoint.get(taskId);
    const seq = (latest?.seq ?? 0) + 1;
    const checkpoint: Checkpoint = {
      id: checkpointId(taskId, seq),
      timestamp: this.now(),
      taskId,
      description,
      state,
      parentId: latest?.checkpoint_id ?? null,
    };
    this.statements.insertCheckpoint.run(
      checkpoint.id,
      taskId,
      seq,
      checkpoint.timestamp,
      description,
      JSON.stringify(state),
      checkpoint.parentId,
    );
    return checkpoint;
  }

  async restoreCheckpoint(id: string): Promise<TaskStateSnapshot> {
    const row = this.statements.getCheckpoint.get(id);
    if (!row) throw new CheckpointNotFoundError(id);
    const checkpoint = mapCheckpoint(row);
    await this.saveState(checkpoint.taskId, checkpoint.state);
    return checkpoint.state;
  }

  async listCheckpoints(taskId: string): Promise<Checkpoint[]> {
    return this.statements.listCheckpoints.all(taskId).map(mapCheckpoint);
  }

  async searchTaskHistory(query: string, limit = DEFAULT_SEARCH_LIMIT): Promise<TaskSearchHit[]> {
    const byTask = new Map<string, { content: string }[]>();
    for (const row of this.statements.allMessages.all()) {
      const list = byTask.get(row.task_id) ?? [];
      list.push({ content: row.content });
      byTask.set(row.task_id, list);
    }
    const hits = [...byTask].map(([taskId, messages]) => ({
      taskId,
      relevance: messageRelevance(messages, query),
    }));
    return rankByRelevance(hits, limit);
  }

  async getRelatedTasks(taskId: string, limit = DEFAULT_RELATED_LIMIT): Promise<RelatedTask[]> {
    const contexts = groupContext(this.statements.allContext.all());
    const own = contexts.get(taskId);
    if (!own) return [];

    const related: RelatedTask[] = [];
    for (const [otherId, context] of contexts) {
      if (otherId === taskId) continue;
      const relevance = contextSimilarity(own, context);
      if (relevance === 0) continue;
      const summary = this.statements.getTaskSummary.get(otherId);
      const stored: Partial<StoredState> = summary ? JSON.parse(summary.data) : {};
      related.push({
        taskId: otherId,
        description: summary?.task ?? '',
        relevance,
        completed: stored.isComplete ?? false,
      });
    }
    return rankByRelevance(related, limit);
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private createDatabase(databasePath?: string): DatabaseInstance {
    if (!databasePath) {
      throw new Error('SqliteStateStorage requires databasePath or database instance');
    }
    if (databasePath !== ':memory:') {
      fs.mkdirSync(path.dirname(databasePath), { recursive: true });
    }
    return new Database(databasePath);
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS states (
        task_id TEXT PRIMARY KEY,
        task TEXT NOT NULL,
        data TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS messages (
        task_id TEXT NOT NULL,
        position INTEGER NOT NULL,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        metadata TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        PRIMARY KEY (task_id, position)
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS context (
        task_id TEXT NOT NULL,
        key TEXT NOT NULL,
        value TEXT NOT NULL,
        PRIMARY KEY (task_id, key)
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS checkpoints (
        checkpoint_id TEXT PRIMARY KEY,
        task_id TEXT NOT NULL,
        seq INTEGER NOT NULL,
        timestamp INTEGER NOT NULL,
        description TEXT NOT NULL,
        state TEXT NOT NULL,
        parent_id TEXT
      )
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_checkpoints_task ON checkpoints (task_id, timestamp, seq)
    `);
  }

  private prepareStatements(): PreparedStatements {
    return {
      upsertState: this.db.prepare<[string, string, string, number]>(`
        INSERT INTO states (task_id, task, data, updated_at) VALUES (?, ?, ?, ?)
        ON CONFLICT(task_id) DO UPDATE SET
          task = excluded.task, data = excluded.data, updated_at = excluded.updated_at
      `),
      getState: this.db.prepare<[string], StateRow>('SELECT task_id, data FROM states WHERE task_id = ?'),
      getTaskSummary: this.db.prepare<[string], { task: string; data: string }>('SELECT task, data FROM states WHERE task_id = ?'),
      deleteMessages: this.db.prepare<[string]>('DELETE FROM messages WHERE task_id = ?'),
      insertMessage: this.db.prepare<[string, number, string, string, string, number]>(
        'INSERT INTO messages (task_id, position, role, content, metadata, timestamp) VALUES (?, ?, ?, ?, ?, ?)',
      ),
      getMessages: this.db.prepare<[string], MessageRow>(
        'SELECT task_id, role, content, metadata, timestamp FROM messages WHERE task_id = ? ORDER BY position',
      ),
      allMessages: this.db.prepare<[], Pick<MessageRow, 'task_id' | 'content'>>(
        'SELECT task_id, content FROM messages ORDER BY task_id, position',
      ),
      deleteContext: this.db.prepare<[string]>('DELETE FROM context WHERE task_id = ?'),
      insertContext: this.db.prepare<[string, string, string]>('INSERT INTO context (task_id, key, value) VALUES (?, ?, ?)'),
      getContext: this.db.prepare<[string], ContextRow>(
        'SELECT task_id, key, value FROM context WHERE task_id = ? ORDER BY rowid',
      ),
      allContext: this.db.prepare<[], ContextRow>('SELECT task_id, key, value FROM context ORDER BY rowid'),
      insertCheckpoint: this.db.prepare<
        [string, string, number, number, string, string, string | null]
      >(
        'INSERT INTO checkpoints (checkpoint_id, task_id, seq, timestamp, description, state, parent_id) VALUES (?, ?, ?, ?, ?, ?, ?)',
      ),
      getCheckpoint: this.db.prepare<[string], CheckpointRow>('SELECT * FROM checkpoints WHERE checkpoint_id = ?'),
      listCheckpoints: this.db.prepare<[string], CheckpointRow>(
        'SELECT * FROM checkpoints WHERE task_id = ? ORDER BY timestamp ASC, seq ASC',
      ),
      latestCheckpoint: this.db.prepare<[string], CheckpointRow>(
        'SELECT * FROM checkpoints WHERE task_id = ? ORDER BY seq DESC LIMIT 1',
      ),
    };
  }
}
