import path from 'node:path';
import { logger } from '@safehouse/shared';

const log = logger.child({ module: 'config' });

export interface ChatConfig {
  port: number;
  dataDir: string;
  missionsDir: string;
  /** Tool calls allowed per turn, clamped to 1..3 */
  maxToolCallsPerTurn: number;
  llmTimeoutMs: number;
  toolTimeoutMs: number;
  /** Unset: cached mission errors never expire */
  missionErrorTtlMs?: number;
  wsHeartbeatMs: number;
}

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    log.warn({ key, raw, fallback }, 'ignoring invalid integer env var');
    return fallback;
  }
  return parsed;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ChatConfig {
  const errorTtl = readInt(env, 'MISSION_ERROR_TTL_MS', 0);
  return {
    port: readInt(env, 'PORT', 3000),
    dataDir: path.resolve(env.DATA_DIR ?? './data'),
    missionsDir: path.resolve(env.MISSIONS_DIR ?? './missions'),
    maxToolCallsPerTurn: clamp(readInt(env, 'MAX_TOOL_CALLS_PER_TURN', 2), 1, 3),
    llmTimeoutMs: readInt(env, 'LLM_TIMEOUT_MS', 30_000),
    toolTimeoutMs: readInt(env, 'TOOL_TIMEOUT_MS', 10_000),
    missionErrorTtlMs: errorTtl > 0 ? errorTtl : undefined,
    wsHeartbeatMs: readInt(env, 'WS_HEARTBEAT_MS', 30_000),
  };
}
