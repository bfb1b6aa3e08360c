import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      port: 3000,
      dataDir: './data',
      maxCycles: 50,
      modelTimeoutMs: 120_000,
      toolTimeoutMs: 20_000,
      approvalTimeoutMs: 180_000,
      toolConcurrency: 4,
      busyPolicy: 'queue',
      streaming: true,
      userName: 'User',
      systemPrompt: undefined,
      systemPromptFile: 'SYSTEM.txt',
      coreFile: 'CORE.txt',
      tasksPath: 'TASKS.json',
      allowedPaths: [process.cwd()],
    });
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      PORT: '8088',
      DATA_DIR: '/var/lib/tessera',
      MAX_CYCLES: '12',
      TOOL_TIMEOUT_MS: '5000',
      TOOL_CONCURRENCY: '1',
      USER_NAME: 'Ada',
      SYSTEM_PROMPT: 'Be brief.',
      CORE_FILE: '/etc/tessera/CORE.txt',
      ALLOWED_PATHS: '/srv, /tmp ,',
      BUSY_POLICY: 'REJECT',
      STREAMING: 'false',
    });

    expect(config.port).toBe(8088);
    expect(config.dataDir).toBe('/var/lib/tessera');
    expect(config.maxCycles).toBe(12);
    expect(config.toolTimeoutMs).toBe(5000);
    expect(config.toolConcurrency).toBe(1);
    expect(config.userName).toBe('Ada');
    expect(config.systemPrompt).toBe('Be brief.');
    expect(config.coreFile).toBe('/etc/tessera/CORE.txt');
    expect(config.allowedPaths).toEqual(['/srv', '/tmp']);
    expect(config.busyPolicy).toBe('reject');
    expect(config.streaming).toBe(false);
  });

  it('falls back to defaults for invalid numbers', () => {
    const config = loadConfig({ MAX_CYCLES: 'lots', TOOL_CONCURRENCY: '0', APPROVAL_TIMEOUT_MS: '1.5' });

    expect(config.maxCycles).toBe(50);
    expect(config.toolConcurrency).toBe(4);
    expect(config.approvalTimeoutMs).toBe(180_000);
  });

  it('falls back for an unknown busy policy and boolean', () => {
    const config = loadConfig({ BUSY_POLICY: 'drop', STREAMING: 'maybe' });

    expect(config.busyPolicy).toBe('queue');
    expect(config.streaming).toBe(true);
  });

  it('resolves relative allowed paths', () => {
    const config = loadConfig({ ALLOWED_PATHS: 'workspace' });

    expect(config.allowedPaths).toEqual([resolve('workspace')]);
  });
});
