import { randomUUID } from 'node:crypto';
import { logger, ConversationBusyError } from '@tessera/shared';
import { ConversationStore } from '@tessera/engine';
import type { ConversationRepository, CycleEngine, CycleResult, RunOptions, StoredMessage } from '@tessera/engine';

const log = logger.child({ module: 'session' });

export type SystemPromptSource = () => Promise<string> | string;

export interface SessionRun {
  store: ConversationStore;
  result: CycleResult;
}

/**
 * Owns the live conversations of the process. Conversations are opened by
 * id (loaded from the repository or created with the system prompt) and
 * saved after every run.
 */
export class SessionManager {
  // Entries resolving to undefined (not found) are dropped once settled
  private stores = new Map<string, Promise<ConversationStore | undefined>>();
  private controllers = new Set<AbortController>();

  constructor(
    readonly engine: CycleEngine,
    private readonly repository: ConversationRepository,
    private readonly systemPrompt: SystemPromptSource,
  ) {}

  /** Open an existing conversation or start a new one under `id`. */
  open(id: string = randomUUID()): Promise<ConversationStore> {
    const known = this.stores.get(id) ?? this.load(id);
    const store = known.then((found) => found ?? this.create(id));
    this.remember(id, store);
    return store;
  }

  /** Look a conversation up without creating it. */
  find(id: string): Promise<ConversationStore | undefined> {
    const known = this.stores.get(id);
    if (known) return known;
    const loading = this.load(id);
    this.remember(id, loading);
    return loading;
  }

  private remember(id: string, entry: Promise<ConversationStore | undefined>): void {
    this.stores.set(id, entry);
    const forget = () => {
      if (this.stores.get(id) === entry) this.stores.delete(id);
    };
    void entry.then((store) => {
      if (!store) forget();
    }, forget);
  }

  private async load(id: string): Promise<ConversationStore | undefined> {
    const loaded = await ConversationStore.load(id, this.repository);
    if (loaded) log.info({ conversationId: id, messages: loaded.length }, 'conversation loaded');
    return loaded;
  }

  private async create(id: string): Promise<ConversationStore> {
    const store = new ConversationStore(id, { repository: this.repository });
    store.append({ role: 'system', content: await this.systemPrompt() });
    log.info({ conversationId: id }, 'conversation created');
    return store;
  }

  async history(id: string): Promise<readonly StoredMessage[] | undefined> {
    return (await this.find(id))?.history();
  }

  /**
   * Run the engine on a conversation and save it afterwards. The save
   * happens whatever the termination reason. The run is cancelled when
   * `options.signal` aborts or on `abortAll`.
   */
  async run(id: string | undefined, message: string, options: RunOptions = {}): Promise<SessionRun> {
    const controller = new AbortController();
    const caller = options.signal;
    const onAbort = () => controller.abort(caller?.reason);
    if (caller?.aborted) controller.abort(caller.reason);
    else caller?.addEventListener('abort', onAbort, { once: true });
    this.controllers.add(controller);

    try {
      const store = await this.open(id);
      const result = await this.engine.run(store, message, { ...options, signal: controller.signal });
      await store.persist();
      log.info(
        { conversationId: store.id, cyclesUsed: result.cyclesUsed, terminationReason: result.terminationReason },
        'run finished',
      );
      return { store, result };
    } finally {
      caller?.removeEventListener('abort', onAbort);
      this.controllers.delete(controller);
    }
  }

  /** Cancel every run in progress. Used on shutdown. */
  abortAll(reason: string): number {
    const count = this.controllers.size;
    for (const controller of this.controllers) controller.abort(new Error(reason));
    if (count > 0) log.info({ runs: count, reason }, 'runs aborted');
    return count;
  }

  get activeRuns(): number {
    return this.controllers.size;
  }

  /**
   * Drop everything but the system messages. Returns false for an unknown id
   * and throws while a run is active on the conversation.
   */
  async clear(id: string): Promise<boolean> {
    if (this.engine.isBusy(id)) throw new ConversationBusyError(id);
    const store = await this.find(id);
    if (!store) return false;
    store.clear();
    await store.persist();
    return true;
  }

  /**
   * Release a conversation from memory. It stays in the repository and is
   * loaded again on the next open. Returns false while a run is active.
   */
  close(id: string): boolean {
    if (this.engine.isBusy(id)) return false;
    return this.stores.delete(id);
  }

  get openCount(): number {
    return this.stores.size;
  }

  isBusy(id: string): boolean {
    return this.engine.isBusy(id);
  }
}
