import * as readline from 'node:readline';
import { randomUUID } from 'node:crypto';
import { logger, errorMessage } from '@tessera/shared';
import { callbackSink } from '@tessera/engine';
import type { PendingApproval, StoredMessage, StreamEvent } from '@tessera/engine';
import type { AgentRuntime } from './runtime.js';
import { loadSystemPrompt, readOptionalFile } from './prompt.js';

const log = logger.child({ module: 'cli' });

export const DIM = '\x1b[2m';
export const CYAN = '\x1b[36m';
export const RED = '\x1b[31m';
export const RESET = '\x1b[0m';

const HELP = [
  '/help            show this help',
  '/history         print the conversation',
  '/clear           forget everything but the system prompt',
  '/save [name]     save the conversation, optionally under a new name',
  '/load <name>     switch to a saved conversation',
  '/tools           list the available tools',
  '/system          show the system prompt',
  '/core            show the core memory',
  '/exit            quit',
  '',
  'Ctrl-C stops a running reply; at the prompt it quits.',
].join('\n');

export interface CliIo {
  write(text: string): void;
  ask(question: string): Promise<string>;
}

/** Terminal rendering of an engine event; undefined for events the CLI does not show. */
export function formatEvent(event: StreamEvent): string | undefined {
  switch (event.type) {
    case 'text_delta':
      return event.text;
    case 'tool_requested':
      return `\n${DIM}[calling ${event.toolName}]${RESET}\n`;
    case 'tool_executed':
      return `${DIM}[${event.toolName}: done in ${event.durationMs}ms]${RESET}\n`;
    case 'tool_errored':
      return `${DIM}[${event.toolName} failed: ${event.error}]${RESET}\n`;
    case 'tool_denied':
      return `${DIM}[${event.toolName} ${event.outcome}]${RESET}\n`;
    default:
      return undefined;
  }
}

export function formatMessage(message: StoredMessage): string {
  const label = message.role === 'tool' && message.name ? `tool:${message.name}` : message.role;
  const calls = message.toolCalls?.length ? ` -> ${message.toolCalls.map((c) => c.name).join(', ')}` : '';
  return `[${label}] ${message.content}${calls}`;
}

export function isApproval(answer: string): boolean {
  return /^y(es)?$/i.test(answer.trim());
}

export class Cli {
  conversationId: string;
  private current?: AbortController;

  constructor(
    private readonly runtime: AgentRuntime,
    private readonly io: CliIo,
    conversationId: string = randomUUID(),
  ) {
    this.conversationId = conversationId;
  }

  /** Handle one input line. Returns false when the session should end. */
  async handleLine(line: string): Promise<boolean> {
    const input = line.trim();
    if (!input) return true;
    if (input.startsWith('/')) return this.command(input);
    await this.chat(input);
    return true;
  }

  private async command(input: string): Promise<boolean> {
    const [name, ...rest] = input.split(/\s+/);
    const arg = rest.join(' ');
    const { sessions, tools } = this.runtime;

    switch (name) {
      case '/exit':
      case '/quit':
        return false;
      case '/help':
        this.io.write(`${HELP}\n`);
        return true;
      case '/history': {
        const history = await sessions.history(this.conversationId);
        if (!history || history.length === 0) {
          this.io.write('(no messages)\n');
          return true;
        }
        this.io.write(`${history.map(formatMessage).join('\n')}\n`);
        return true;
      }
      case '/clear': {
        const cleared = await sessions.clear(this.conversationId);
        this.io.write(cleared ? 'Conversation cleared.\n' : 'Nothing to clear.\n');
        return true;
      }
      case '/system':
        this.io.write(`${await loadSystemPrompt(this.runtime.config)}\n`);
        return true;
      case '/core': {
        const core = (await readOptionalFile(this.runtime.config.coreFile))?.trim();
        this.io.write(core ? `${core}\n` : '(core memory is empty)\n');
        return true;
      }
      case '/save': {
        const store = await sessions.open(this.conversationId);
        const record = await store.persist(arg || undefined);
        this.io.write(`Saved conversation as '${record.id}'.\n`);
        return true;
      }
      case '/load': {
        if (!arg) {
          this.io.write('Usage: /load <name>\n');
          return true;
        }
        const store = await sessions.find(arg);
        if (!store) {
          this.io.write(`No saved conversation '${arg}'.\n`);
          return true;
        }
        this.conversationId = store.id;
        this.io.write(`Loaded '${store.id}' (${store.length} messages).\n`);
        return true;
      }
      case '/tools':
        this.io.write(
          `${tools
            .list()
            .map((t) => `${t.name}${t.sensitivity === 'approval-required' ? ' (needs approval)' : ''}: ${t.description}`)
            .join('\n')}\n`,
        );
        return true;
      default:
        this.io.write(`Unknown command: ${name}. Type /help for commands.\n`);
        return true;
    }
  }

  private async chat(message: string): Promise<void> {
    const sink = callbackSink((event) => {
      const out = formatEvent(event);
      if (out !== undefined) this.io.write(out);
    });
    const controller = new AbortController();
    this.current = controller;
    try {
      const { result } = await this.runtime.sessions.run(this.conversationId, message, {
        sink,
        signal: controller.signal,
      });
      if (result.terminationReason !== 'completed') {
        const detail = result.error ? `: ${result.error.message}` : '';
        this.io.write(`\n${RED}[${result.terminationReason}${detail}]${RESET}`);
      }
      this.io.write('\n');
    } catch (err) {
      log.error({ err }, 'chat failed');
      this.io.write(`${RED}Error: ${errorMessage(err)}${RESET}\n`);
    } finally {
      if (this.current === controller) this.current = undefined;
    }
  }

  /** Cancel the reply in progress. Returns false when nothing is running. */
  interrupt(): boolean {
    if (!this.current) return false;
    this.current.abort(new Error('interrupted'));
    return true;
  }

  async askApproval(approval: PendingApproval): Promise<void> {
    const { conversationId, toolCallId, context } = approval;
    const answer = await this.io.ask(
      `\n${CYAN}Approve ${context.toolName} with ${JSON.stringify(context.arguments)}? [y/N]${RESET} `,
    );
    const approved = isApproval(answer);
    this.runtime.approvals.decide(
      conversationId,
      toolCallId,
      approved ? 'approved' : 'denied',
      'cli',
      approved ? undefined : 'declined at the terminal',
    );
  }

  /** Prompt for every approval the engine raises. Returns a detach function. */
  attachApprovals(): () => void {
    const { approvals } = this.runtime;
    const listener = (approval: PendingApproval) => {
      void this.askApproval(approval).catch((err: unknown) => {
        log.warn({ err, toolCallId: approval.toolCallId }, 'approval prompt failed');
        approvals.decide(approval.conversationId, approval.toolCallId, 'denied', 'cli', 'approval prompt failed');
      });
    };
    approvals.on('requested', listener);
    return () => approvals.off('requested', listener);
  }
}

export async function startCli(runtime: AgentRuntime): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  rl.once('close', () => {
    closed = true;
  });

  const io: CliIo = {
    write: (text) => {
      process.stdout.write(text);
    },
    ask: (question) =>
      new Promise<string>((resolve, reject) => {
        if (closed) {
          reject(new Error('EOF'));
          return;
        }
        const onClose = () => reject(new Error('EOF'));
        rl.once('close', onClose);
        rl.question(question, (answer) => {
          rl.off('close', onClose);
          resolve(answer);
        });
      }),
  };

  const cli = new Cli(runtime, io);
  const detach = cli.attachApprovals();
  rl.on('SIGINT', () => {
    if (cli.interrupt()) io.write(`\n${DIM}[interrupted]${RESET}\n`);
    else rl.close();
  });
  io.write(`Type /help for commands.\n`);
  try {
    for (;;) {
      const line = await io.ask(`${CYAN}tessera ${cli.conversationId.slice(0, 8)}>${RESET} `);
      if (!(await cli.handleLine(line))) break;
    }
  } catch (err) {
    if (errorMessage(err) !== 'EOF') throw err;
  } finally {
    detach();
    rl.close();
  }
}
