import { createServer } from 'node:http';
import { logger } from '@tessera/shared';
import { loadConfig } from './config.js';
import { createRuntime } from './runtime.js';
import { createApi } from './api.js';
import { startCli } from './cli.js';
import { TaskScheduler } from './scheduler.js';

const log = logger.child({ module: 'agent' });

async function serve(): Promise<void> {
  const config = loadConfig();
  const runtime = await createRuntime(config);

  const { app, attachWebSocket } = createApi(runtime);
  const server = createServer(app);
  const wss = attachWebSocket(server);

  const scheduler = new TaskScheduler(runtime.sessions);
  await scheduler.loadFromFile(config.tasksPath);

  server.listen(config.port, () => {
    log.info({ port: config.port, tools: runtime.tools.names() }, 'agent listening');
  });

  const shutdown = (signal: string) => {
    log.info({ signal }, 'shutting down');
    scheduler.stopAll();
    runtime.sessions.abortAll(`received ${signal}`);
    wss.close();
    server.close(() => process.exit(0));
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

async function main(): Promise<void> {
  if (process.argv[2] === 'cli') {
    const runtime = await createRuntime(loadConfig());
    await startCli(runtime);
    return;
  }
  await serve();
}

main().catch((err) => {
  log.fatal({ err }, 'agent failed to start');
  process.exit(1);
});
