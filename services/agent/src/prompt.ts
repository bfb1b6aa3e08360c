import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { logger } from '@tessera/shared';
import type { AgentConfig } from './config.js';

const log = logger.child({ module: 'prompt' });

export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful assistant.';

export interface PromptVariables {
  userName: string;
  corePath: string;
  date: Date;
}

/** YYYY-MM-DD in local time */
export function formatDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

export function renderPrompt(template: string, vars: PromptVariables): string {
  return template
    .replaceAll('{{DATE}}', formatDate(vars.date))
    .replaceAll('{{USER_NAME}}', vars.userName)
    .replaceAll('{{CORE_PATH}}', vars.corePath);
}

/** File contents, or undefined when the file does not exist. */
export async function readOptionalFile(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
    throw err;
  }
}

/**
 * Build the system prompt for a new conversation: the inline prompt or the
 * prompt file, with placeholders filled in and the core memory appended.
 */
export async function loadSystemPrompt(config: AgentConfig, now: Date = new Date()): Promise<string> {
  const corePath = resolve(config.coreFile);
  let template = config.systemPrompt;
  if (template === undefined) {
    template = (await readOptionalFile(config.systemPromptFile))?.trim();
    if (!template) {
      log.debug({ file: config.systemPromptFile }, 'no system prompt file, using default');
      template = DEFAULT_SYSTEM_PROMPT;
    }
  }

  const vars = { userName: config.userName, corePath, date: now };
  const prompt = renderPrompt(template, vars);
  const core = (await readOptionalFile(corePath))?.trim();
  if (!core) return prompt;
  return `${prompt}\n\n${renderPrompt(core, vars)}`;
}
