import { z } from 'zod';
import { InMemoryConversationRepository, defineTool } from '@tessera/engine';
import type { ToolSpec } from '@tessera/engine';
import type { ModelClient, ModelRequest, ModelResponse, ModelStreamEvent, ToolCallRequest } from '@tessera/shared';
import type { AgentConfig } from '../config.js';
import { createRuntime } from '../runtime.js';
import type { AgentRuntime } from '../runtime.js';

export function testConfig(overrides: Partial<AgentConfig> = {}): AgentConfig {
  return {
    port: 0,
    dataDir: '/tmp/tessera-test',
    maxCycles: 5,
    modelTimeoutMs: 1000,
    toolTimeoutMs: 1000,
    approvalTimeoutMs: 5000,
    toolConcurrency: 2,
    busyPolicy: 'reject',
    streaming: false,
    userName: 'Tester',
    systemPrompt: 'You are a test assistant.',
    systemPromptFile: '/nonexistent/SYSTEM.txt',
    coreFile: '/nonexistent/CORE.txt',
    tasksPath: '/nonexistent/TASKS.json',
    allowedPaths: ['/tmp'],
    ...overrides,
  };
}

type Reply = ModelResponse | Promise<ModelResponse>;

/** Answers requests from a queue of replies. Streaming is not supported. */
export class QueueModel implements ModelClient {
  readonly requests: ModelRequest[] = [];

  constructor(private readonly replies: Reply[]) {}

  async request(req: ModelRequest): Promise<ModelResponse> {
    this.requests.push(req);
    const next = this.replies.shift();
    if (!next) throw new Error('no scripted reply left');
    return next;
  }

  async *stream(): AsyncGenerator<ModelStreamEvent> {
    throw new Error('streaming is disabled in these tests');
  }
}

export function reply(text: string, toolCalls: ToolCallRequest[] = []): ModelResponse {
  return { text, toolCalls, stopReason: toolCalls.length > 0 ? 'tool_use' : 'end_turn', model: 'test-model' };
}

export function call(id: string, name: string, args: unknown): ToolCallRequest {
  return { id, name, arguments: JSON.stringify(args) };
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function testTools(): ToolSpec[] {
  return [
    defineTool({
      name: 'echo',
      description: 'Echo the text back',
      schema: z.object({ text: z.string() }),
      sensitivity: 'normal',
      handler: (args) => `echo: ${args.text}`,
    }),
    defineTool({
      name: 'wipe',
      description: 'Pretend to wipe a disk',
      schema: z.object({ device: z.string() }),
      sensitivity: 'approval-required',
      handler: (args) => `wiped ${args.device}`,
    }),
  ];
}

export async function testRuntime(
  replies: Reply[],
  overrides: Partial<AgentConfig> = {},
  repository: InMemoryConversationRepository = new InMemoryConversationRepository(),
): Promise<AgentRuntime & { model: QueueModel; repository: InMemoryConversationRepository }> {
  const model = new QueueModel(replies);
  const runtime = await createRuntime(testConfig(overrides), { model, repository, tools: testTools() });
  return { ...runtime, model, repository };
}
