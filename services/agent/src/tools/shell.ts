import { exec } from 'node:child_process';
import { z } from 'zod';
import { logger } from '@tessera/shared';
import { defineTool } from '@tessera/engine';
import type { ToolSpec } from '@tessera/engine';
import type { AgentConfig } from '../config.js';

const log = logger.child({ module: 'shell-tools' });

const MAX_OUTPUT_BYTES = 1024 * 1024;
const MAX_COMMAND_TIMEOUT_SECONDS = 600;

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunShellOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/** Run `command` through /bin/sh. Resolves with the exit code; rejects on timeout or abort. */
export function runShell(command: string, options: RunShellOptions): Promise<CommandResult> {
  const { timeoutMs, signal } = options;
  return new Promise<CommandResult>((resolve, reject) => {
    exec(command, { timeout: timeoutMs, signal, maxBuffer: MAX_OUTPUT_BYTES }, (err, stdout, stderr) => {
      if (!err) {
        resolve({ stdout, stderr, exitCode: 0 });
        return;
      }
      if (signal?.aborted) {
        reject(new Error('command aborted'));
        return;
      }
      if (err.killed) {
        reject(new Error(`command timed out after ${timeoutMs}ms`));
        return;
      }
      resolve({ stdout, stderr, exitCode: typeof err.code === 'number' ? err.code : 1 });
    });
  });
}

/** Text returned to the model. A failing command reports its stderr. */
export function formatCommandResult(result: CommandResult): string {
  if (result.exitCode !== 0) {
    const stderr = result.stderr.trim();
    return `Error: ${stderr || `command exited with code ${result.exitCode}`}`;
  }
  return result.stdout.trim() || '(no output)';
}

export function withSudo(command: string): string {
  const trimmed = command.trim();
  return trimmed.split(/\s+/)[0] === 'sudo' ? trimmed : `sudo ${trimmed}`;
}

const commandSchema = z.object({
  command: z.string().min(1).describe('Shell command to run'),
  timeoutSeconds: z
    .number()
    .int()
    .positive()
    .max(MAX_COMMAND_TIMEOUT_SECONDS)
    .optional()
    .describe('Seconds before the command is killed'),
});

export function createShellTools(config: AgentConfig): ToolSpec[] {
  const defaultTimeoutMs = config.toolTimeoutMs;
  // The command's own timeout governs; the engine deadline only backs it up.
  const engineTimeoutMs = MAX_COMMAND_TIMEOUT_SECONDS * 1000 + 5_000;

  async function run(command: string, timeoutSeconds: number | undefined, signal: AbortSignal): Promise<string> {
    const timeoutMs = timeoutSeconds !== undefined ? timeoutSeconds * 1000 : defaultTimeoutMs;
    log.info({ command, timeoutMs }, 'running command');
    const result = await runShell(command, { timeoutMs, signal });
    if (result.exitCode !== 0) log.warn({ command, exitCode: result.exitCode }, 'command failed');
    return formatCommandResult(result);
  }

  return [
    defineTool({
      name: 'run_command',
      description:
        'Run a shell command on the host and return its standard output. A failing command returns its error output.',
      schema: commandSchema,
      sensitivity: 'normal',
      timeoutMs: engineTimeoutMs,
      handler: (args, ctx) => run(args.command, args.timeoutSeconds, ctx.signal),
    }),
    defineTool({
      name: 'run_privileged_command',
      description: 'Run a shell command with sudo. Every call needs operator approval.',
      schema: commandSchema,
      sensitivity: 'approval-required',
      timeoutMs: engineTimeoutMs,
      handler: (args, ctx) => run(withSudo(args.command), args.timeoutSeconds, ctx.signal),
    }),
  ];
}
