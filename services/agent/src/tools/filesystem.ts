import { open, readdir, stat } from 'node:fs/promises';
import { resolve, normalize, sep } from 'node:path';
import { z } from 'zod';
import { defineTool } from '@tessera/engine';
import type { ToolSpec } from '@tessera/engine';
import type { AgentConfig } from '../config.js';

const DEFAULT_MAX_BYTES = 64 * 1024;

/**
 * Resolve `targetPath` and check that it lies within one of `allowedPaths`.
 * Throws when it does not.
 */
export function validatePath(targetPath: string, allowedPaths: readonly string[]): string {
  const resolved = resolve(normalize(targetPath));
  const allowed = allowedPaths.some((base) => {
    const root = resolve(base);
    return resolved === root || resolved.startsWith(root.endsWith(sep) ? root : root + sep);
  });
  if (!allowed) {
    throw new Error(`Access denied: "${resolved}" is not within allowed paths [${allowedPaths.join(', ')}]`);
  }
  return resolved;
}

async function readHead(path: string, maxBytes: number): Promise<{ text: string; truncated: boolean; size: number }> {
  const handle = await open(path, 'r');
  try {
    const { size } = await handle.stat();
    const length = Math.min(size, maxBytes);
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return { text: buffer.subarray(0, bytesRead).toString('utf-8'), truncated: size > maxBytes, size };
  } finally {
    await handle.close();
  }
}

export function createFilesystemTools(config: AgentConfig): ToolSpec[] {
  const { allowedPaths } = config;

  return [
    defineTool({
      name: 'read_file',
      description: 'Read a text file. The path must be within the allowed directories.',
      schema: z.object({
        path: z.string().min(1).describe('Absolute or relative path to the file'),
        maxBytes: z.number().int().positive().optional().describe('Read at most this many bytes'),
      }),
      sensitivity: 'normal',
      handler: async (args) => {
        const path = validatePath(args.path, allowedPaths);
        const info = await stat(path);
        if (!info.isFile()) throw new Error(`"${path}" is not a file`);
        const maxBytes = args.maxBytes ?? DEFAULT_MAX_BYTES;
        const { text, truncated, size } = await readHead(path, maxBytes);
        return truncated ? `${text}\n[truncated: first ${maxBytes} of ${size} bytes]` : text;
      },
    }),
    defineTool({
      name: 'list_directory',
      description: 'List the entries of a directory. Directories end with "/". The path must be within the allowed directories.',
      schema: z.object({
        path: z.string().min(1).describe('Absolute or relative path to the directory'),
      }),
      sensitivity: 'normal',
      handler: async (args) => {
        const path = validatePath(args.path, allowedPaths);
        const entries = await readdir(path, { withFileTypes: true });
        if (entries.length === 0) return '(empty directory)';
        return entries
          .map((e) => `${e.name}${e.isDirectory() ? '/' : ''}`)
          .sort()
          .join('\n');
      },
    }),
  ];
}
