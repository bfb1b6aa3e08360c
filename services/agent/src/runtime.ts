import { ModelRouter, loadModelConfig } from '@tessera/shared';
import type { ModelClient } from '@tessera/shared';
import { ApprovalGate, CycleEngine, FileConversationRepository, ToolRegistry } from '@tessera/engine';
import type { ConversationRepository, ToolSpec } from '@tessera/engine';
import type { AgentConfig } from './config.js';
import { loadSystemPrompt } from './prompt.js';
import { SessionManager } from './session.js';
import { createAllTools } from './tools/index.js';

export interface AgentRuntime {
  config: AgentConfig;
  tools: ToolRegistry;
  approvals: ApprovalGate;
  engine: CycleEngine;
  sessions: SessionManager;
}

export interface RuntimeOverrides {
  model?: ModelClient;
  repository?: ConversationRepository;
  tools?: ToolSpec[];
}

/** Wire the engine, tools and sessions for one process. */
export async function createRuntime(config: AgentConfig, overrides: RuntimeOverrides = {}): Promise<AgentRuntime> {
  let model = overrides.model;
  if (!model) {
    const modelConfig = await loadModelConfig();
    model = await ModelRouter.create({ ...modelConfig, timeoutMs: modelConfig.timeoutMs ?? config.modelTimeoutMs });
  }

  const tools = ToolRegistry.fromManifest(overrides.tools ?? createAllTools(config));
  const approvals = new ApprovalGate({ defaultTimeoutMs: config.approvalTimeoutMs });
  const engine = new CycleEngine({
    model,
    tools,
    approvals,
    maxCycles: config.maxCycles,
    toolTimeoutMs: config.toolTimeoutMs,
    approvalTimeoutMs: config.approvalTimeoutMs,
    toolConcurrency: config.toolConcurrency,
    busyPolicy: config.busyPolicy,
    streaming: config.streaming,
  });
  const repository = overrides.repository ?? new FileConversationRepository(config.dataDir);
  const sessions = new SessionManager(engine, repository, () => loadSystemPrompt(config));

  return { config, tools, approvals, engine, sessions };
}
