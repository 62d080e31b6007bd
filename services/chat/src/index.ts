import { createServer } from 'node:http';
import {
  logger,
  features,
  getTraceHeaders,
  loadModelConfig,
  ModelRouter,
  type ApiCallInfo,
} from '@safehouse/shared';
import { createApi } from './api.js';
import { ChatSession } from './chat-session.js';
import { loadConfig } from './config.js';
import { ConnectionRegistry } from './connection-registry.js';
import { createSqliteConversationRepository } from './conversation-repository.js';
import { ConversationStore } from './conversation-store.js';
import { getDb, closeDb, insertApiAudit } from './db.js';
import { createRouterLlmClient } from './llm-client.js';
import { MissionContextCache } from './mission-cache.js';
import { createFileMissionBackend, createMissionToolHandler } from './mission-tools.js';
import { sqlitePersonaLookup } from './persona-repository.js';
import { ToolCallLoop } from './tool-loop.js';

const log = logger.child({ module: 'chat' });

async function main() {
  log.info('starting chat service');
  const config = loadConfig();

  // Initialize SQLite
  getDb(config.dataDir);

  // Initialize model router
  const modelConfig = await loadModelConfig();
  const modelRouter = await ModelRouter.create(modelConfig);

  // Wire audit logging for model API calls
  modelRouter.setOnApiCall((info: ApiCallInfo) => {
    const traceId = getTraceHeaders()['traceparent']?.split('-')[1];
    try {
      insertApiAudit({ ...info, traceId });
    } catch (err) {
      log.warn({ err }, 'failed to write API audit entry');
    }
  });

  const cache = new MissionContextCache({ errorTtlMs: config.missionErrorTtlMs });
  const tools = features.isEnabled('missionTools')
    ? [createMissionToolHandler(createFileMissionBackend(config.missionsDir))]
    : [];
  const loop = new ToolCallLoop({
    llm: createRouterLlmClient(modelRouter),
    cache,
    tools,
    maxToolCalls: config.maxToolCallsPerTurn,
    llmTimeoutMs: config.llmTimeoutMs,
    toolTimeoutMs: config.toolTimeoutMs,
  });

  const registry = new ConnectionRegistry();
  const store = new ConversationStore({
    repository: createSqliteConversationRepository(),
    personas: sqlitePersonaLookup,
  });
  const session = new ChatSession({ personas: sqlitePersonaLookup, store, loop, registry, features });

  const { app, attachWebSocket } = createApi({
    session,
    store,
    registry,
    features,
    wsHeartbeatMs: config.wsHeartbeatMs,
  });
  const server = createServer(app);
  const stopWebSocket = attachWebSocket(server);

  server.listen(config.port, () => {
    log.info({ port: config.port, missionsDir: config.missionsDir, tools: tools.length }, 'chat API listening');
  });

  // Graceful shutdown
  const shutdown = () => {
    log.info('shutting down');
    stopWebSocket();
    server.close();
    closeDb();
    process.exit(0);
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  log.fatal({ err }, 'chat service failed to start');
  process.exit(1);
});
