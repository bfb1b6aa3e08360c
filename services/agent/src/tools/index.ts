import type { ToolSpec } from '@tessera/engine';
import type { AgentConfig } from '../config.js';
import { createShellTools } from './shell.js';
import { createSystemInfoTools } from './system-info.js';
import { createFilesystemTools } from './filesystem.js';
import { createCoreTools } from './core.js';

/** The agent's tool manifest, in the order tools are offered to the model. */
export function createAllTools(config: AgentConfig): ToolSpec[] {
  return [
    ...createShellTools(config),
    ...createSystemInfoTools(),
    ...createFilesystemTools(config),
    ...createCoreTools(config),
  ];
}
