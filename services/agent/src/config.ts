import { resolve } from 'node:path';
import { logger } from '@tessera/shared';
import {
  DEFAULT_APPROVAL_TIMEOUT_MS,
  DEFAULT_MAX_CYCLES,
  DEFAULT_TOOL_CONCURRENCY,
  DEFAULT_TOOL_TIMEOUT_MS,
} from '@tessera/engine';
import type { BusyPolicy } from '@tessera/engine';

const log = logger.child({ module: 'config' });

const VALID_BUSY_POLICIES: BusyPolicy[] = ['queue', 'reject'];

export const DEFAULT_MODEL_TIMEOUT_MS = 120_000;

export interface AgentConfig {
  port: number;
  dataDir: string;
  maxCycles: number;
  modelTimeoutMs: number;
  toolTimeoutMs: number;
  approvalTimeoutMs: number;
  toolConcurrency: number;
  busyPolicy: BusyPolicy;
  streaming: boolean;
  userName: string;
  /** Inline prompt; wins over the prompt file when set */
  systemPrompt?: string;
  systemPromptFile: string;
  coreFile: string;
  tasksPath: string;
  /** Roots the filesystem tools may read under */
  allowedPaths: string[];
}

function parseCommaSeparated(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}

function parsePositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    log.warn({ variable: name, configured: raw, using: fallback }, 'invalid number, falling back to default');
    return fallback;
  }
  return value;
}

function parseBoolean(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  log.warn({ variable: name, configured: env[name], using: fallback }, 'invalid boolean, falling back to default');
  return fallback;
}

function parseBusyPolicy(raw: string | undefined): BusyPolicy {
  const value = (raw ?? 'queue').trim().toLowerCase();
  const policy = VALID_BUSY_POLICIES.find((p) => p === value);
  if (!policy) {
    log.warn({ configured: raw, using: 'queue' }, 'invalid BUSY_POLICY, falling back to queue');
    return 'queue';
  }
  return policy;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  const allowedPaths = parseCommaSeparated(env.ALLOWED_PATHS).map((p) => resolve(p));

  const config: AgentConfig = {
    port: parsePositiveInt(env, 'PORT', 3000),
    dataDir: env.DATA_DIR ?? './data',
    maxCycles: parsePositiveInt(env, 'MAX_CYCLES', DEFAULT_MAX_CYCLES),
    modelTimeoutMs: parsePositiveInt(env, 'MODEL_TIMEOUT_MS', DEFAULT_MODEL_TIMEOUT_MS),
    toolTimeoutMs: parsePositiveInt(env, 'TOOL_TIMEOUT_MS', DEFAULT_TOOL_TIMEOUT_MS),
    approvalTimeoutMs: parsePositiveInt(env, 'APPROVAL_TIMEOUT_MS', DEFAULT_APPROVAL_TIMEOUT_MS),
    toolConcurrency: parsePositiveInt(env, 'TOOL_CONCURRENCY', DEFAULT_TOOL_CONCURRENCY),
    busyPolicy: parseBusyPolicy(env.BUSY_POLICY),
    streaming: parseBoolean(env, 'STREAMING', true),
    userName: env.USER_NAME || 'User',
    systemPrompt: env.SYSTEM_PROMPT || undefined,
    systemPromptFile: env.SYSTEM_PROMPT_FILE ?? 'SYSTEM.txt',
    coreFile: env.CORE_FILE ?? 'CORE.txt',
    tasksPath: env.TASKS_PATH ?? 'TASKS.json',
    allowedPaths: allowedPaths.length > 0 ? allowedPaths : [process.cwd()],
  };

  log.info(
    {
      port: config.port,
      dataDir: config.dataDir,
      maxCycles: config.maxCycles,
      busyPolicy: config.busyPolicy,
      streaming: config.streaming,
      allowedPaths: config.allowedPaths,
    },
    'config loaded',
  );

  return config;
}
