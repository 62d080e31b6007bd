import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { IncomingMessage, Server } from 'node:http';
import type { Duplex } from 'node:stream';
import { z } from 'zod';
import {
  logger,
  ValidationError,
  type ClientMessage,
  type Features,
  type NotFoundError,
  type Result,
  type SafehouseError,
  type ServerEnvelope,
} from '@safehouse/shared';
import type { ChatSession, TurnRequest, TurnResult } from './chat-session.js';
import type { ConnectionRegistry } from './connection-registry.js';
import type { ConversationStore } from './conversation-store.js';
import {
  createPersona,
  deletePersona,
  getPersona,
  listPersonas,
  updatePersona,
} from './persona-repository.js';

const log = logger.child({ module: 'chat-api' });

export interface ApiDeps {
  session: Pick<ChatSession, 'runTurn' | 'runDebrief'>;
  store: ConversationStore;
  registry: ConnectionRegistry;
  features: Features;
  /** Interval between heartbeat pings, when the wsHeartbeat flag is on */
  wsHeartbeatMs: number;
}

export interface ChatApi {
  app: Express;
  /** Route WebSocket upgrades on `server`; returns a function that stops the socket server */
  attachWebSocket: (server: Server) => () => void;
}

const chatBodySchema: z.ZodType<ClientMessage> = z.object({ message: z.string().trim().min(1) });
const createConversationSchema = z.object({
  personaId: z.string().min(1),
  title: z.string().max(200).optional(),
});
const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

const WS_PATH = /^\/ws\/chat\/([^/]+)(?:\/conversations\/([^/]+))?\/?$/;
const POLICY_VIOLATION = 1008;

function statusFor(error: SafehouseError): number {
  switch (error.code) {
    case 'NOT_FOUND':
      return 404;
    case 'VALIDATION':
      return 400;
    default:
      return 500;
  }
}

function sendError(res: Response, error: SafehouseError): void {
  const status = statusFor(error);
  if (status === 500) {
    log.error({ err: error }, 'request failed');
    res.status(500).json({ error: 'internal server error' });
    return;
  }
  if (error instanceof ValidationError) {
    res.status(status).json({ error: error.message, issues: error.issues });
    return;
  }
  res.status(status).json({ error: error.message });
}

function zodIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

/** express.json() rejects malformed bodies with this error type */
function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Express 4 does not catch rejected handlers; forward them to the error middleware. */
function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

export function createApi(deps: ApiDeps): ChatApi {
  const { session, store, registry, features } = deps;
  const app = express();
  app.use(express.json());

  app.get('/ping', (_req: Request, res: Response) => {
    res.json({ status: 'ok', connections: registry.size });
  });

  // --- Personas ---

  app.get('/api/personas', (_req: Request, res: Response) => {
    res.json(listPersonas());
  });

  app.post('/api/personas', (req: Request, res: Response) => {
    const result = createPersona(req.body);
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.status(201).json(result.value);
  });

  app.get('/api/personas/:id', (req: Request, res: Response) => {
    const persona = getPersona(req.params.id);
    if (!persona) {
      res.status(404).json({ error: `persona ${req.params.id} not found` });
      return;
    }
    res.json(persona);
  });

  app.put('/api/personas/:id', (req: Request, res: Response) => {
    const result = updatePersona(req.params.id, req.body);
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.json(result.value);
  });

  app.delete('/api/personas/:id', (req: Request, res: Response) => {
    if (!deletePersona(req.params.id)) {
      res.status(404).json({ error: `persona ${req.params.id} not found` });
      return;
    }
    res.json({ message: `persona ${req.params.id} deleted` });
  });

  app.get('/api/personas/:id/conversations', route(async (req, res) => {
    if (!getPersona(req.params.id)) {
      res.status(404).json({ error: `persona ${req.params.id} not found` });
      return;
    }
    res.json(await store.listForOwner(req.params.id));
  }));

  // --- Conversations ---

  app.post('/api/conversations', route(async (req, res) => {
    const parsed = createConversationSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'invalid conversation', issues: zodIssues(parsed.error) });
      return;
    }
    const result = await store.create(parsed.data.personaId, { title: parsed.data.title });
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.status(201).json({ personaId: parsed.data.personaId, conversationId: result.value });
  }));

  app.get('/api/conversations', route(async (req, res) => {
    const parsed = listQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: 'invalid query', issues: zodIssues(parsed.error) });
      return;
    }
    res.json(await store.list(parsed.data));
  }));

  app.get('/api/conversations/:id', route(async (req, res) => {
    const result = await store.get(req.params.id);
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.json(result.value);
  }));

  app.delete('/api/conversations/:id', route(async (req, res) => {
    if (!(await store.delete(req.params.id))) {
      res.status(404).json({ error: `conversation ${req.params.id} not found` });
      return;
    }
    res.status(204).end();
  }));

  // --- Chat (HTTP) ---

  async function chat(
    req: Request,
    res: Response,
    run: (message: string) => Promise<Result<TurnResult, NotFoundError>>,
  ): Promise<void> {
    const parsed = chatBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'message is required', issues: zodIssues(parsed.error) });
      return;
    }
    const result = await run(parsed.data.message);
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    const turn = result.value;
    res.json({
      personaId: turn.personaId,
      personaName: turn.personaName,
      message: parsed.data.message,
      response: turn.responseText,
      conversationId: turn.conversationId,
      status: turn.status,
      toolCalls: turn.toolCalls,
    });
  }

  app.post('/api/chat/:personaId', route((req, res) =>
    chat(req, res, (message) => session.runTurn({ personaId: req.params.personaId, message })),
  ));
  app.post('/api/chat/:personaId/conversations/:conversationId', route((req, res) =>
    chat(req, res, (message) =>
      session.runTurn({ personaId: req.params.personaId, conversationId: req.params.conversationId, message }),
    ),
  ));
  app.post('/api/debrief/:personaId/:missionId', route((req, res) =>
    chat(req, res, (message) =>
      session.runDebrief({ personaId: req.params.personaId, missionId: req.params.missionId, message }),
    ),
  ));

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(error)) {
      res.status(400).json({ error: 'invalid JSON body' });
      return;
    }
    log.error({ err: error }, 'unhandled request error');
    res.status(500).json({ error: 'internal server error' });
  });

  // --- WebSocket ---

  function attachWebSocket(server: Server): () => void {
    const wss = new WebSocketServer({ noServer: true });
    const alive = new WeakMap<WebSocket, boolean>();

    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      const { pathname } = new URL(req.url ?? '/', 'http://localhost');
      const match = WS_PATH.exec(pathname);
      if (!match) {
        socket.write('HTTP/1.1 404 Not Found\r\n\r\n');
        socket.destroy();
        return;
      }
      const personaId = decodeURIComponent(match[1]);
      const conversationId = match[2] === undefined ? undefined : decodeURIComponent(match[2]);

      wss.handleUpgrade(req, socket, head, (ws) => {
        onConnection(ws, personaId, conversationId).catch((error: unknown) => {
          log.error({ err: error, personaId }, 'websocket setup failed');
          ws.close(1011, 'internal error');
        });
      });
    });

    async function onConnection(ws: WebSocket, personaId: string, fixedConversationId: string | undefined): Promise<void> {
      const persona = getPersona(personaId);
      if (!persona) {
        ws.close(POLICY_VIOLATION, 'unknown persona');
        return;
      }
      if (fixedConversationId !== undefined) {
        const conversation = await store.get(fixedConversationId);
        if (!conversation.ok || conversation.value.ownerId !== personaId) {
          ws.close(POLICY_VIOLATION, 'unknown conversation');
          return;
        }
      }

      alive.set(ws, true);
      ws.on('pong', () => alive.set(ws, true));

      const connectionId = registry.connect(
        {
          send: (envelope: ServerEnvelope) =>
            new Promise<void>((resolve, reject) => {
              if (ws.readyState !== WebSocket.OPEN) {
                reject(new Error('socket is not open'));
                return;
              }
              ws.send(JSON.stringify(envelope), (error) => (error ? reject(error) : resolve()));
            }),
          close: (code, reason) => ws.close(code, reason),
        },
        { personaId, conversationId: fixedConversationId },
      );
      let conversationId = fixedConversationId;

      ws.on('close', () => registry.disconnect(connectionId));
      ws.on('error', (error) => {
        log.warn({ err: error, connectionId }, 'websocket error');
        registry.disconnect(connectionId);
      });

      const welcome =
        fixedConversationId === undefined
          ? `Connected to ${persona.name} (${persona.codename})`
          : `Connected to conversation with ${persona.name}`;
      await registry.sendTo(connectionId, { type: 'system', message: welcome, personaId, conversationId });

      const handleFrame = async (data: RawData): Promise<void> => {
        let body: unknown;
        try {
          body = JSON.parse(data.toString());
        } catch {
          body = undefined;
        }
        const parsed = chatBodySchema.safeParse(body);
        if (!parsed.success) {
          await registry.sendTo(connectionId, { type: 'error', message: 'Invalid message format' });
          return;
        }

        const request: TurnRequest = {
          personaId,
          conversationId,
          message: parsed.data.message,
          originConnectionId: connectionId,
        };
        const result = await session.runTurn(request);
        if (!result.ok) {
          await registry.sendTo(connectionId, { type: 'error', message: result.error.message });
          return;
        }
        conversationId = result.value.conversationId;
      };

      ws.on('message', (data: RawData) => {
        handleFrame(data).catch((error: unknown) => {
          log.error({ err: error, connectionId }, 'websocket message error');
          void registry.sendTo(connectionId, { type: 'error', message: 'Processing error' });
        });
      });
    }

    let heartbeat: NodeJS.Timeout | undefined;
    if (features.isEnabled('wsHeartbeat')) {
      heartbeat = setInterval(() => {
        for (const ws of wss.clients) {
          if (alive.get(ws) === false) {
            log.info('terminating unresponsive websocket');
            ws.terminate();
            continue;
          }
          alive.set(ws, false);
          ws.ping();
        }
      }, deps.wsHeartbeatMs);
      heartbeat.unref();
    }

    return () => {
      if (heartbeat) clearInterval(heartbeat);
      registry.closeAll(1001, 'server shutting down');
      wss.close();
    };
  }

  return { app, attachWebSocket };
}
