import { readFile } from 'node:fs/promises';
import path from 'node:path';
import {
  logger,
  NotFoundError,
  UpstreamError,
  ok,
  err,
  type Result,
  type ToolDefinition,
} from '@safehouse/shared';

import type { ToolHandler } from './tool-loop.js';

const log = logger.child({ module: 'mission-tools' });

export const MISSION_TOOL_NAME = 'get_mission_context';

const MISSION_ID_PATTERN = /^[a-z0-9][a-z0-9_-]{0,63}$/;

// "mission atlas-9", "mission id: paris", "Mission #london"
const MISSION_REFERENCE = /\bmission(?:\s+id)?(?:\s*[:#]\s*|\s+)([a-z0-9][a-z0-9_-]{0,63})\b/gi;
// "mission_123" names its file outright
const MISSION_TOKEN = /\b(mission_[a-z0-9][a-z0-9_-]{0,55})\b/gi;

// Words that follow "mission" in ordinary speech and are never ids
const NOT_AN_ID = new Set([
  'a', 'about', 'accomplished', 'again', 'ago', 'already', 'an', 'and', 'are', 'before', 'briefing',
  'brief', 'can', 'complete', 'completed', 'context', 'could', 'details', 'did', 'earlier', 'ever',
  'failed', 'file', 'files', 'first', 'for', 'go', 'going', 'had', 'has', 'id', 'ids', 'in', 'info',
  'information', 'is', 'it', 'just', 'last', 'lately', 'later', 'next', 'now', 'of', 'on', 'once',
  'previous', 'recently', 'report', 'since', 'soon', 'status', 'still', 'that', 'the', 'then', 'this',
  'to', 'today', 'tomorrow', 'tonight', 'was', 'we', 'went', 'were', 'when', 'will', 'with',
  'yesterday', 'yet', 'you', 'your',
]);

// Requests for the contents of a single mission: "tell me about the mission",
// "what happened on that mission", "mission details"
const DETAILS_REQUEST =
  /\b(?:tell me (?:more )?about|details (?:of|on|about)|(?:de)?brief me (?:on|about)|what happened (?:on|in|during)|pull (?:up )?the file (?:on|for)|info(?:rmation)? (?:on|about)|status of|remind me (?:of|about))\s+(?:the|that|this|our|my|your|a)\s+mission\b|\bmission (?:details|file|report|briefing|info(?:rmation)?)\b/i;

export interface MissionContext {
  missionId: string;
  content: string;
}

/** Where mission records come from. */
export interface MissionBackend {
  fetchMissionContext(missionId: string): Promise<Result<MissionContext, NotFoundError | UpstreamError>>;
}

export const missionToolDefinition: ToolDefinition = {
  name: MISSION_TOOL_NAME,
  description:
    'Retrieve detailed information about a mission for accurate debriefing. ' +
    'ONLY use this tool when the user explicitly gives a mission ID. ' +
    'Do not use it for general conversation or to guess an ID.',
  input_schema: {
    type: 'object',
    properties: {
      mission_id: { type: 'string', description: 'Unique ID of the mission to retrieve' },
    },
    required: ['mission_id'],
  },
};

export function isValidMissionId(id: string): boolean {
  return MISSION_ID_PATTERN.test(id);
}

/** Mission ids the text names explicitly, lower-cased, in order of first mention. */
export function extractMissionIds(text: string): string[] {
  const found: Array<{ index: number; id: string }> = [];
  for (const pattern of [MISSION_TOKEN, MISSION_REFERENCE]) {
    for (const match of text.matchAll(pattern)) {
      found.push({ index: match.index ?? 0, id: match[1].toLowerCase() });
    }
  }
  found.sort((a, b) => a.index - b.index);

  const ids: string[] = [];
  for (const { id } of found) {
    if (!NOT_AN_ID.has(id) && isValidMissionId(id) && !ids.includes(id)) ids.push(id);
  }
  return ids;
}

/** Whether the text asks for a mission's details, with or without naming it. */
export function asksForMissionDetails(text: string): boolean {
  return DETAILS_REQUEST.test(text);
}

/** Reads `<dir>/<missionId>.txt`. */
export function createFileMissionBackend(dir: string): MissionBackend {
  return {
    async fetchMissionContext(missionId) {
      if (!isValidMissionId(missionId)) {
        return err(new NotFoundError('mission', missionId));
      }
      const file = path.join(dir, `${missionId}.txt`);
      try {
        const content = await readFile(file, 'utf-8');
        return ok({ missionId, content });
      } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
          return err(new NotFoundError('mission', missionId));
        }
        log.error({ err: error, missionId }, 'failed to read mission file');
        return err(new UpstreamError(`failed to read mission ${missionId}`, { cause: error }));
      }
    },
  };
}

/** The mission lookup as a gated tool for the turn loop. */
export function createMissionToolHandler(backend: MissionBackend): ToolHandler {
  return {
    definition: missionToolDefinition,
    requiredKey: 'mission_id',
    referencedKeys: extractMissionIds,
    asksForRecord: asksForMissionDetails,
    clarifyingQuestion: 'Which mission are you referring to? Give me the mission ID and I will pull the file.',
    normalizeArgs(args) {
      const id = args.mission_id;
      return typeof id === 'string' ? { ...args, mission_id: id.trim().toLowerCase() } : args;
    },
    async execute(args) {
      const missionId = String(args.mission_id);
      const result = await backend.fetchMissionContext(missionId);
      if (result.ok) return { status: 'success', payload: result.value.content };
      if (result.error instanceof NotFoundError) {
        return { status: 'error', payload: `No mission found with ID: ${missionId}` };
      }
      throw result.error;
    },
  };
}
