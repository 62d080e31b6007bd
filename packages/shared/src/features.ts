import { logger } from './logger.js';

// ---------------------------------------------------------------------------
// Flag registry — single source of truth for all feature flags
// ---------------------------------------------------------------------------

const FLAG_REGISTRY = {
  missionTools:          { prod: true, dev: true,  desc: 'Expose the mission lookup tool to agents' },
  conversationBroadcast: { prod: true, dev: true,  desc: 'Fan turn results out to every connection on a conversation' },
  wsHeartbeat:           { prod: true, dev: false, desc: 'Ping WebSocket clients and drop dead ones' },
} as const;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Union of all known flag names. */
export type FeatureFlag = keyof typeof FLAG_REGISTRY;

/** Operating mode: prod (default) or dev. */
export type SafehouseMode = 'prod' | 'dev';

/** Resolved feature flag interface. */
export interface Features {
  /** The active operating mode (prod or dev). */
  readonly mode: SafehouseMode;
  /** Check if a specific feature flag is enabled. */
  isEnabled(flag: FeatureFlag): boolean;
  /** Return a snapshot of all resolved flag values. */
  allFlags(): Record<FeatureFlag, boolean>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Convert a camelCase flag name to FEATURE_SCREAMING_SNAKE env var name.
 *
 * e.g. missionTools → FEATURE_MISSION_TOOLS
 */
export function toEnvKey(flag: string): string {
  const snake = flag.replace(/[A-Z]/g, (ch) => `_${ch}`).toUpperCase();
  return `FEATURE_${snake}`;
}

function parseMode(value: string | undefined): SafehouseMode {
  return value === 'dev' ? 'dev' : 'prod';
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create a Features instance by resolving flags from:
 * 1. FEATURE_<SCREAMING_SNAKE> env var override (if set)
 * 2. Mode profile default from FLAG_REGISTRY
 *
 * Mode is determined by SAFEHOUSE_MODE; defaults to 'prod'.
 */
export function createFeatures(env: NodeJS.ProcessEnv = process.env): Features {
  const mode = parseMode(env.SAFEHOUSE_MODE);

  const known = new Set(Object.keys(FLAG_REGISTRY).map(toEnvKey));

  // Env var override: 'true'/'1' enable, anything else disables
  const resolveFlag = (flag: FeatureFlag): boolean => {
    const envVal = env[toEnvKey(flag)];
    return envVal !== undefined ? envVal === 'true' || envVal === '1' : FLAG_REGISTRY[flag][mode];
  };

  const resolved: Record<FeatureFlag, boolean> = {
    missionTools: resolveFlag('missionTools'),
    conversationBroadcast: resolveFlag('conversationBroadcast'),
    wsHeartbeat: resolveFlag('wsHeartbeat'),
  };

  const unknownVars = Object.keys(env).filter((key) => key.startsWith('FEATURE_') && !known.has(key));
  if (unknownVars.length > 0) {
    logger.warn({ unknownVars }, 'unknown FEATURE_* env vars detected — these have no effect');
  }

  logger.info({ mode, flags: resolved }, 'feature flags resolved');

  return {
    mode,
    isEnabled(flag: FeatureFlag): boolean {
      return resolved[flag];
    },
    allFlags(): Record<FeatureFlag, boolean> {
      return { ...resolved };
    },
  };
}

// ---------------------------------------------------------------------------
// Singleton (convenience export)
// ---------------------------------------------------------------------------

export const features: Features = createFeatures();
