import { appendFile } from 'node:fs/promises';
import { z } from 'zod';
import { logger } from '@tessera/shared';
import { defineTool } from '@tessera/engine';
import type { ToolSpec } from '@tessera/engine';
import type { AgentConfig } from '../config.js';

const log = logger.child({ module: 'core-tools' });

/**
 * The core memory file is appended to every new conversation's system
 * prompt, so facts written here outlive the conversation.
 */
export function createCoreTools(config: AgentConfig): ToolSpec[] {
  return [
    defineTool({
      name: 'update_core',
      description:
        'Append a note to the core memory file. Core memory is included in the system prompt of every future conversation.',
      schema: z.object({
        text: z.string().min(1).describe('Text to append'),
      }),
      sensitivity: 'approval-required',
      handler: async (args) => {
        await appendFile(config.coreFile, `\n${args.text}\n`, 'utf-8');
        log.info({ file: config.coreFile, length: args.text.length }, 'core memory updated');
        return `Appended ${args.text.length} characters to core memory.`;
      },
    }),
  ];
}
