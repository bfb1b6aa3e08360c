import express from 'express';
import type { Express, Request, Response } from 'express';
import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'node:http';
import { z } from 'zod';
import { logger, ConversationBusyError, TesseraError, errorMessage } from '@tessera/shared';
import { callbackSink } from '@tessera/engine';
import type { CycleResult, PendingApproval, StreamEvent } from '@tessera/engine';
import type { AgentRuntime } from './runtime.js';

const log = logger.child({ module: 'api' });

const chatRequestSchema = z.object({
  message: z.string().min(1),
  conversationId: z.string().min(1).optional(),
});

const decisionRequestSchema = z.object({
  approved: z.boolean(),
  reason: z.string().optional(),
  decidedBy: z.string().min(1).optional(),
});

const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('chat'), message: z.string().min(1), conversationId: z.string().min(1).optional() }),
  z.object({
    type: z.literal('decision'),
    conversationId: z.string().min(1),
    toolCallId: z.string().min(1),
    approved: z.boolean(),
    reason: z.string().optional(),
  }),
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;

export interface SerializedResult {
  conversationId: string;
  cyclesUsed: number;
  terminationReason: CycleResult['terminationReason'];
  finalMessage?: string;
  error?: { name: string; message: string; code?: string };
}

export type ServerMessage =
  | { type: 'event'; event: StreamEvent }
  | { type: 'approval'; approval: PendingApproval }
  | { type: 'result'; result: SerializedResult }
  | { type: 'error'; message: string };

export function serializeResult(result: CycleResult): SerializedResult {
  const serialized: SerializedResult = {
    conversationId: result.conversationId,
    cyclesUsed: result.cyclesUsed,
    terminationReason: result.terminationReason,
  };
  if (result.finalMessage) serialized.finalMessage = result.finalMessage.content;
  if (result.error) {
    serialized.error = { name: result.error.name, message: result.error.message };
    if (result.error instanceof TesseraError) serialized.error.code = result.error.code;
  }
  return serialized;
}

function send(ws: WebSocket, msg: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(msg));
  }
}

export function createApi(runtime: AgentRuntime): { app: Express; attachWebSocket: (server: Server) => WebSocketServer } {
  const { sessions, tools, approvals } = runtime;
  const app = express();
  app.use(express.json());

  // Health check
  app.get('/ping', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.get('/api/tools', (_req: Request, res: Response) => {
    const definitions = new Map(tools.definitions().map((d) => [d.name, d]));
    res.json({
      tools: tools.list().map((spec) => ({
        name: spec.name,
        description: spec.description,
        sensitivity: spec.sensitivity,
        inputSchema: definitions.get(spec.name)?.inputSchema,
      })),
    });
  });

  app.post('/api/chat', async (req: Request, res: Response) => {
    const parsed = chatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'message is required' });
      return;
    }

    // A client that goes away before the answer cancels the run
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort(new Error('client disconnected'));
    });

    try {
      const { result } = await sessions.run(parsed.data.conversationId, parsed.data.message, {
        signal: controller.signal,
      });
      if (res.destroyed) return;
      res.json(serializeResult(result));
    } catch (err) {
      if (err instanceof ConversationBusyError) {
        res.status(409).json({ error: err.message });
        return;
      }
      log.error({ err }, 'chat error');
      res.status(500).json({ error: 'Internal error' });
    }
  });

  app.get('/api/conversations/:id', async (req: Request, res: Response) => {
    try {
      const messages = await sessions.history(req.params.id);
      if (!messages) {
        res.status(404).json({ error: 'conversation not found' });
        return;
      }
      res.json({ id: req.params.id, messages });
    } catch (err) {
      log.error({ err, conversationId: req.params.id }, 'failed to load conversation');
      res.status(500).json({ error: 'Internal error' });
    }
  });

  app.delete('/api/conversations/:id', async (req: Request, res: Response) => {
    try {
      const cleared = await sessions.clear(req.params.id);
      if (!cleared) {
        res.status(404).json({ error: 'conversation not found' });
        return;
      }
      res.status(204).end();
    } catch (err) {
      if (err instanceof ConversationBusyError) {
        res.status(409).json({ error: err.message });
        return;
      }
      log.error({ err, conversationId: req.params.id }, 'failed to clear conversation');
      res.status(500).json({ error: 'Internal error' });
    }
  });

  app.get('/api/approvals', (req: Request, res: Response) => {
    const conversationId = typeof req.query.conversationId === 'string' ? req.query.conversationId : undefined;
    res.json({ approvals: approvals.pending(conversationId) });
  });

  app.post('/api/approvals/:conversationId/:toolCallId', (req: Request, res: Response) => {
    const parsed = decisionRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'approved (boolean) is required' });
      return;
    }
    const { conversationId, toolCallId } = req.params;
    const { approved, reason, decidedBy } = parsed.data;
    const decided = approvals.decide(conversationId, toolCallId, approved ? 'approved' : 'denied', decidedBy ?? 'http', reason);
    if (!decided) {
      res.status(404).json({ error: 'no pending approval for this tool call' });
      return;
    }
    res.json({ decided: true, outcome: approved ? 'approved' : 'denied' });
  });

  function attachWebSocket(server: Server): WebSocketServer {
    const wss = new WebSocketServer({ server, path: '/terminal' });
    const clients = new Set<WebSocket>();

    // Approvals raised by any run reach every connected terminal
    const onRequested = (approval: PendingApproval) => {
      for (const ws of clients) send(ws, { type: 'approval', approval });
    };
    approvals.on('requested', onRequested);
    wss.on('close', () => approvals.off('requested', onRequested));

    wss.on('connection', (ws) => {
      log.info('terminal client connected');
      clients.add(ws);
      const connection = new AbortController();
      for (const approval of approvals.pending()) send(ws, { type: 'approval', approval });

      ws.on('message', async (data) => {
        let msg: ClientMessage;
        try {
          msg = clientMessageSchema.parse(JSON.parse(data.toString()));
        } catch (err) {
          log.warn({ err }, 'invalid terminal message');
          send(ws, { type: 'error', message: `Invalid message: ${errorMessage(err)}` });
          return;
        }

        if (msg.type === 'decision') {
          const decided = approvals.decide(
            msg.conversationId,
            msg.toolCallId,
            msg.approved ? 'approved' : 'denied',
            'terminal',
            msg.reason,
          );
          if (!decided) send(ws, { type: 'error', message: `No pending approval for tool call '${msg.toolCallId}'` });
          return;
        }

        try {
          const sink = callbackSink((event) => send(ws, { type: 'event', event }));
          const { result } = await sessions.run(msg.conversationId, msg.message, {
            sink,
            signal: connection.signal,
          });
          send(ws, { type: 'result', result: serializeResult(result) });
        } catch (err) {
          log.error({ err }, 'websocket chat error');
          send(ws, { type: 'error', message: err instanceof ConversationBusyError ? err.message : 'Processing error' });
        }
      });

      ws.on('close', () => {
        log.info('terminal client disconnected');
        clients.delete(ws);
        connection.abort(new Error('terminal disconnected'));
      });
    });

    return wss;
  }

  return { app, attachWebSocket };
}
