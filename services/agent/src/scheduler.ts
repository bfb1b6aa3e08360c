import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { logger, errorMessage } from '@tessera/shared';
import type { CycleResult } from '@tessera/engine';
import { readOptionalFile } from './prompt.js';
import type { SessionManager } from './session.js';

const log = logger.child({ module: 'scheduler' });

export const taskDefinitionSchema = z.object({
  name: z.string().min(1),
  schedule: z.string().min(1),
  prompt: z.string().min(1),
  enabled: z.boolean().default(true),
});

export type TaskDefinition = z.infer<typeof taskDefinitionSchema>;

/**
 * Runs prompts on cron schedules. Each firing gets a fresh conversation and
 * the `task` model role; a firing is skipped while the previous run of the
 * same task is still going.
 */
export class TaskScheduler {
  private tasks = new Map<string, { definition: TaskDefinition; timer: ScheduledTask }>();
  private running = new Set<string>();

  constructor(private readonly sessions: SessionManager) {}

  /**
   * Register the tasks listed in a JSON file. A missing file registers
   * nothing; invalid entries are skipped with a warning.
   */
  async loadFromFile(path: string): Promise<number> {
    const raw = await readOptionalFile(path);
    if (raw === undefined) {
      log.info({ path }, 'no tasks file, scheduler idle');
      return 0;
    }

    let entries: unknown;
    try {
      entries = JSON.parse(raw);
    } catch (err) {
      throw new Error(`tasks file '${path}' is not valid JSON: ${errorMessage(err)}`);
    }
    if (!Array.isArray(entries)) {
      throw new Error(`tasks file '${path}' must contain an array of tasks`);
    }

    let count = 0;
    for (const entry of entries) {
      const parsed = taskDefinitionSchema.safeParse(entry);
      if (!parsed.success) {
        log.warn({ entry, issues: parsed.error.issues }, 'invalid task entry, skipping');
        continue;
      }
      if (!parsed.data.enabled) continue;
      try {
        this.register(parsed.data);
        count++;
      } catch (err) {
        log.warn({ err, name: parsed.data.name }, 'failed to register task, skipping');
      }
    }
    log.info({ count, total: entries.length }, 'loaded scheduled tasks');
    return count;
  }

  register(definition: TaskDefinition): void {
    if (!cron.validate(definition.schedule)) {
      throw new Error(`Invalid cron expression: ${definition.schedule}`);
    }
    if (this.tasks.has(definition.name)) {
      throw new Error(`Task '${definition.name}' is already registered`);
    }
    const timer = cron.schedule(definition.schedule, () => {
      void this.runTask(definition);
    });
    this.tasks.set(definition.name, { definition, timer });
    log.info({ name: definition.name, schedule: definition.schedule }, 'task registered');
  }

  /**
   * Run a task once. Resolves with undefined when the run was skipped or
   * failed before producing a result; never rejects.
   */
  async runTask(definition: TaskDefinition): Promise<CycleResult | undefined> {
    const { name } = definition;
    if (this.running.has(name)) {
      log.warn({ name }, 'previous run still active, skipping');
      return undefined;
    }

    this.running.add(name);
    const conversationId = `task-${name}-${randomUUID()}`;
    try {
      log.info({ name, conversationId }, 'running scheduled task');
      const { result } = await this.sessions.run(conversationId, definition.prompt, { role: 'task' });
      log.info(
        {
          name,
          conversationId,
          cyclesUsed: result.cyclesUsed,
          terminationReason: result.terminationReason,
          output: result.finalMessage?.content,
        },
        'scheduled task finished',
      );
      return result;
    } catch (err) {
      log.error({ err, name, conversationId }, 'scheduled task failed');
      return undefined;
    } finally {
      this.running.delete(name);
      this.sessions.close(conversationId);
    }
  }

  isRunning(name: string): boolean {
    return this.running.has(name);
  }

  list(): TaskDefinition[] {
    return [...this.tasks.values()].map((t) => t.definition);
  }

  unregister(name: string): boolean {
    const task = this.tasks.get(name);
    if (!task) return false;
    task.timer.stop();
    this.tasks.delete(name);
    return true;
  }

  stopAll(): void {
    for (const { timer } of this.tasks.values()) timer.stop();
    this.tasks.clear();
  }
}
