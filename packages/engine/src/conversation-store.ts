import { createHash, randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { logger, OrderViolationError } from '@tessera/shared';
import type { Message } from '@tessera/shared';

const log = logger.child({ module: 'conversation-store' });

export interface StoredMessage extends Message {
  /** ISO-8601 time the message was appended */
  timestamp: string;
}

export interface ConversationRecord {
  id: string;
  savedAt: string;
  messages: StoredMessage[];
}

export interface ConversationRepository {
  save(record: ConversationRecord): Promise<void>;
  /** Resolves undefined when nothing was saved under the id */
  load(id: string): Promise<ConversationRecord | undefined>;
}

const toolCallSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  arguments: z.string(),
});

const storedMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.string(),
  name: z.string().optional(),
  toolCallId: z.string().optional(),
  toolCalls: z.array(toolCallSchema).optional(),
  timestamp: z.string(),
});

export const conversationRecordSchema = z.object({
  id: z.string().min(1),
  savedAt: z.string(),
  messages: z.array(storedMessageSchema),
});

export interface ConversationStoreOptions {
  repository?: ConversationRepository;
  now?: () => Date;
}

/**
 * Ordered, append-only message log of one conversation.
 *
 * Tool results must answer a call issued by the immediately preceding
 * assistant message, and nothing else may be appended while such calls are
 * still unanswered.
 */
export class ConversationStore {
  readonly id: string;
  private entries: StoredMessage[] = [];
  private pending = new Set<string>();
  private readonly repository?: ConversationRepository;
  private readonly now: () => Date;

  constructor(id: string = randomUUID(), options: ConversationStoreOptions = {}) {
    this.id = id;
    this.repository = options.repository;
    this.now = options.now ?? (() => new Date());
  }

  get length(): number {
    return this.entries.length;
  }

  append(message: Message): number {
    return this.push({ ...message, timestamp: this.now().toISOString() });
  }

  private push(message: StoredMessage): number {
    this.check(message);
    const entry: StoredMessage = Object.freeze({
      ...message,
      ...(message.toolCalls
        ? { toolCalls: Object.freeze(message.toolCalls.map((call) => Object.freeze({ ...call }))) }
        : {}),
    });
    this.entries.push(entry);
    this.track(entry);
    return this.entries.length - 1;
  }

  private check(message: StoredMessage): void {
    if (message.role === 'tool') {
      if (!message.toolCallId) {
        throw new OrderViolationError('tool message without a toolCallId');
      }
      if (!this.pending.has(message.toolCallId)) {
        throw new OrderViolationError(
          `tool message '${message.toolCallId}' does not answer a pending call of the preceding assistant message`,
        );
      }
      return;
    }
    if (this.pending.size > 0) {
      throw new OrderViolationError(
        `cannot append a ${message.role} message while tool calls are unanswered: ${[...this.pending].join(', ')}`,
      );
    }
    if (message.toolCalls) {
      const ids = new Set(message.toolCalls.map((call) => call.id));
      if (message.role !== 'assistant') {
        throw new OrderViolationError(`only assistant messages may issue tool calls, got ${message.role}`);
      }
      if (ids.size !== message.toolCalls.length) {
        throw new OrderViolationError('assistant message issues the same tool call id twice');
      }
    }
  }

  private track(message: Message): void {
    if (message.role === 'tool' && message.toolCallId) {
      this.pending.delete(message.toolCallId);
    } else if (message.role === 'assistant' && message.toolCalls?.length) {
      this.pending = new Set(message.toolCalls.map((call) => call.id));
    }
  }

  /** Immutable snapshot; this is what gets sent to the model. */
  history(): readonly StoredMessage[] {
    return Object.freeze([...this.entries]);
  }

  /** Calls of the last assistant message that have no result yet, in issue order. */
  pendingToolCallIds(): string[] {
    return [...this.pending];
  }

  /**
   * Drop the oldest non-system messages so that at most `keepLastN` remain,
   * or a few more when the cut would separate tool results from the
   * assistant message that issued them. Returns the number removed.
   */
  truncate(keepLastN: number): number {
    if (!Number.isInteger(keepLastN) || keepLastN < 0) {
      throw new RangeError(`keepLastN must be a non-negative integer, got ${keepLastN}`);
    }
    const positions = this.entries.flatMap((m, i) => (m.role === 'system' ? [] : [i]));
    if (positions.length <= keepLastN) return 0;

    let cut = positions.length - keepLastN;
    while (cut > 0 && cut < positions.length && this.entries[positions[cut]].role === 'tool') {
      cut--;
    }
    if (cut === 0) return 0;

    const dropped = new Set(positions.slice(0, cut));
    this.entries = this.entries.filter((_, i) => !dropped.has(i));
    this.replayPending();
    log.debug({ conversationId: this.id, removed: dropped.size }, 'conversation truncated');
    return dropped.size;
  }

  /** Drop everything except system messages. */
  clear(): void {
    this.entries = this.entries.filter((m) => m.role === 'system');
    this.pending = new Set();
    log.info({ conversationId: this.id }, 'conversation cleared');
  }

  private replayPending(): void {
    this.pending = new Set();
    for (const entry of this.entries) this.track(entry);
  }

  toRecord(id: string = this.id): ConversationRecord {
    return {
      id,
      savedAt: this.now().toISOString(),
      messages: this.entries.map((m) => ({ ...m, ...(m.toolCalls ? { toolCalls: m.toolCalls.map((c) => ({ ...c })) } : {}) })),
    };
  }

  /** Save through the configured repository, optionally under another id. */
  async persist(id?: string): Promise<ConversationRecord> {
    if (!this.repository) {
      throw new Error(`conversation '${this.id}' has no repository to persist to`);
    }
    const record = this.toRecord(id);
    await this.repository.save(record);
    log.debug({ conversationId: record.id, messages: record.messages.length }, 'conversation persisted');
    return record;
  }

  /**
   * Rebuild a store from a record. Messages are replayed through the same
   * ordering checks as `append`, so a corrupted record is rejected.
   */
  static fromRecord(record: ConversationRecord, options: ConversationStoreOptions = {}): ConversationStore {
    const store = new ConversationStore(record.id, options);
    for (const message of record.messages) store.push(message);
    return store;
  }

  static async load(
    id: string,
    repository: ConversationRepository,
    options: Omit<ConversationStoreOptions, 'repository'> = {},
  ): Promise<ConversationStore | undefined> {
    const record = await repository.load(id);
    if (!record) return undefined;
    return ConversationStore.fromRecord(record, { ...options, repository });
  }
}

// ---------------------------------------------------------------------------
// Repositories
// ---------------------------------------------------------------------------

function cloneRecord(record: ConversationRecord): ConversationRecord {
  return conversationRecordSchema.parse(JSON.parse(JSON.stringify(record)));
}

export class InMemoryConversationRepository implements ConversationRepository {
  private records = new Map<string, ConversationRecord>();

  async save(record: ConversationRecord): Promise<void> {
    this.records.set(record.id, cloneRecord(record));
  }

  async load(id: string): Promise<ConversationRecord | undefined> {
    const record = this.records.get(id);
    return record ? cloneRecord(record) : undefined;
  }
}

/** One pretty-printed JSON file per conversation under `<dataDir>/conversations`. */
export class FileConversationRepository implements ConversationRepository {
  private readonly dir: string;

  constructor(dataDir: string) {
    this.dir = join(dataDir, 'conversations');
  }

  /** File names are hashed so arbitrary ids are safe on disk. */
  pathFor(id: string): string {
    return join(this.dir, `${createHash('sha256').update(id).digest('hex')}.json`);
  }

  async save(record: ConversationRecord): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const path = this.pathFor(record.id);
    const tmp = `${path}.${process.pid}.tmp`;
    await writeFile(tmp, JSON.stringify(record, null, 2), 'utf-8');
    await rename(tmp, path);
  }

  async load(id: string): Promise<ConversationRecord | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(id), 'utf-8');
    } catch (err: unknown) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
      throw err;
    }
    const parsed = conversationRecordSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`conversation record for '${id}' is malformed: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    if (parsed.data.id !== id) {
      throw new Error(`conversation record at ${this.pathFor(id)} belongs to '${parsed.data.id}'`);
    }
    return parsed.data;
  }
}
