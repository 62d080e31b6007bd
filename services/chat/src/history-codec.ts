/**
 * HistoryCodec — reads every encoding a conversation blob has ever been
 * stored in, and writes only the canonical one.
 *
 * Accepted on decode:
 *   1. canonical: {"format":"safehouse.history","version":2,"messages":[...]}
 *   2. flat entries: [{ role, content, tool_call_id?, tool_calls? }, ...]
 *   3. parts entries: [{ kind: "request"|"response", parts: [{ part_kind, ... }] }, ...]
 *   4. a single object of shape 2 or 3
 *   5. anything else: the whole payload as one assistant message
 *
 * Decoding never throws. Entries that cannot be read are skipped, and tool
 * messages are kept only when they answer an earlier assistant tool call.
 */

import { z } from 'zod';
import { logger } from '@safehouse/shared';
import type { ContentPart, Message, MessageRole, ToolCall } from './types.js';

const log = logger.child({ module: 'history-codec' });

export const HISTORY_FORMAT = 'safehouse.history';
export const HISTORY_VERSION = 2;

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const roleSchema = z.enum(['system', 'user', 'assistant', 'tool']);

const textPartSchema = z.object({ type: z.literal('text'), text: z.string() });

const toolCallSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  arguments: z.record(z.unknown()),
});

const canonicalMessageSchema = z.object({
  role: roleSchema,
  content: z.union([z.string(), z.array(textPartSchema)]),
  toolCallId: z.string().min(1).optional(),
  toolCalls: z.array(toolCallSchema).optional(),
});

const canonicalEnvelopeSchema = z.object({
  format: z.literal(HISTORY_FORMAT),
  version: z.number().int().positive(),
  messages: z.array(z.unknown()),
});

const flatEntrySchema = z.object({
  role: z.string(),
  content: z.union([z.string(), z.null(), z.array(z.unknown())]).optional(),
  tool_call_id: z.string().optional(),
  toolCallId: z.string().optional(),
  tool_calls: z.array(z.unknown()).optional(),
  toolCalls: z.array(z.unknown()).optional(),
});

const rawArgsSchema = z.union([z.string(), z.record(z.unknown())]).optional();

const legacyToolCallSchema = z.union([
  // OpenAI style: { id, type: "function", function: { name, arguments } }
  z.object({
    id: z.string().min(1),
    function: z.object({ name: z.string().min(1), arguments: rawArgsSchema }),
  }),
  z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    arguments: rawArgsSchema,
    args: rawArgsSchema,
  }),
]);

const partsEntrySchema = z.object({
  kind: z.enum(['request', 'response']),
  parts: z.array(z.unknown()),
});

const partSchema = z.object({
  part_kind: z.string(),
  content: z.unknown().optional(),
  tool_name: z.string().optional(),
  args: rawArgsSchema,
  tool_call_id: z.string().optional(),
});

type FlatEntry = z.infer<typeof flatEntrySchema>;
type PartsEntry = z.infer<typeof partsEntrySchema>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseArgsJson(raw: string): Record<string, unknown> {
  if (raw.trim() === '') return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

// Parts-style logs may wrap arguments as {args_dict: {...}} or {args_json: "..."}
function parseArgs(raw: z.infer<typeof rawArgsSchema>): Record<string, unknown> {
  if (raw === undefined) return {};
  if (typeof raw === 'string') return parseArgsJson(raw);
  const keys = Object.keys(raw);
  if (keys.length === 1 && keys[0] === 'args_dict' && isRecord(raw.args_dict)) return raw.args_dict;
  if (keys.length === 1 && keys[0] === 'args_json' && typeof raw.args_json === 'string') {
    return parseArgsJson(raw.args_json);
  }
  return raw;
}

function stringify(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined || value === null) return '';
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function toContentParts(items: unknown[]): ContentPart[] {
  const parts: ContentPart[] = [];
  for (const item of items) {
    if (typeof item === 'string') {
      parts.push({ type: 'text', text: item });
      continue;
    }
    const part = textPartSchema.safeParse(item);
    if (part.success) parts.push(part.data);
  }
  return parts;
}

function toToolCalls(items: unknown[]): ToolCall[] {
  const calls: ToolCall[] = [];
  for (const item of items) {
    const parsed = legacyToolCallSchema.safeParse(item);
    if (!parsed.success) {
      log.debug({ item }, 'skipping unreadable tool call');
      continue;
    }
    const call = parsed.data;
    if ('function' in call) {
      calls.push({ id: call.id, name: call.function.name, arguments: parseArgs(call.function.arguments) });
    } else {
      calls.push({ id: call.id, name: call.name, arguments: parseArgs(call.arguments ?? call.args) });
    }
  }
  return calls;
}

function withOptional(
  role: MessageRole,
  content: Message['content'],
  toolCallId?: string,
  toolCalls?: ToolCall[],
): Message {
  const msg: Message = { role, content };
  if (toolCallId) msg.toolCallId = toolCallId;
  if (toolCalls) msg.toolCalls = toolCalls;
  return msg;
}

// ---------------------------------------------------------------------------
// Shape readers
// ---------------------------------------------------------------------------

function fromFlat(entry: FlatEntry): Message | undefined {
  const role = roleSchema.safeParse(entry.role);
  if (!role.success) return undefined;

  let content: Message['content'];
  if (Array.isArray(entry.content)) {
    const parts = toContentParts(entry.content);
    content = parts.length > 0 ? parts : '';
  } else {
    content = entry.content ?? '';
  }

  const rawCalls = entry.toolCalls ?? entry.tool_calls;
  const calls = role.data === 'assistant' && rawCalls ? toToolCalls(rawCalls) : [];
  const toolCalls = calls.length > 0 ? calls : undefined;
  const toolCallId = role.data === 'tool' ? entry.toolCallId ?? entry.tool_call_id : undefined;

  return withOptional(role.data, content, toolCallId, toolCalls);
}

function fromParts(entry: PartsEntry): Message[] {
  const out: Message[] = [];
  const texts: string[] = [];
  const calls: ToolCall[] = [];

  for (const raw of entry.parts) {
    const parsed = partSchema.safeParse(raw);
    if (!parsed.success) {
      log.debug({ part: raw }, 'skipping unreadable history part');
      continue;
    }
    const part = parsed.data;

    switch (part.part_kind) {
      case 'system-prompt':
        out.push({ role: 'system', content: stringify(part.content) });
        break;
      case 'user-prompt':
        out.push({
          role: 'user',
          content: Array.isArray(part.content)
            ? part.content.map(stringify).join('\n')
            : stringify(part.content),
        });
        break;
      case 'tool-return':
        out.push(withOptional('tool', stringify(part.content), part.tool_call_id));
        break;
      case 'retry-prompt':
        // A retry tied to a tool call answers that call; otherwise it is a nudge to the model
        out.push(part.tool_name
          ? withOptional('tool', stringify(part.content), part.tool_call_id)
          : { role: 'user', content: stringify(part.content) });
        break;
      case 'text':
        texts.push(stringify(part.content));
        break;
      case 'tool-call':
        if (part.tool_name && part.tool_call_id) {
          calls.push({ id: part.tool_call_id, name: part.tool_name, arguments: parseArgs(part.args) });
        }
        break;
      default:
        log.debug({ partKind: part.part_kind }, 'skipping unknown history part kind');
    }
  }

  if (entry.kind === 'response' && (texts.length > 0 || calls.length > 0)) {
    out.push(withOptional('assistant', texts.join(''), undefined, calls.length > 0 ? calls : undefined));
  }
  return out;
}

/** Decode one list entry of either legacy shape; undefined when neither fits. */
function fromLegacyEntry(raw: unknown): Message[] | undefined {
  const flat = flatEntrySchema.safeParse(raw);
  if (flat.success) {
    const msg = fromFlat(flat.data);
    return msg ? [msg] : undefined;
  }
  const parts = partsEntrySchema.safeParse(raw);
  if (parts.success) return fromParts(parts.data);
  return undefined;
}

function fromCanonical(entries: unknown[]): Message[] {
  const out: Message[] = [];
  for (const raw of entries) {
    const parsed = canonicalMessageSchema.safeParse(raw);
    if (!parsed.success) {
      log.debug({ entry: raw }, 'skipping malformed canonical entry');
      continue;
    }
    const m = parsed.data;
    out.push(withOptional(m.role, m.content, m.toolCallId, m.toolCalls));
  }
  return out;
}

/** Drop tool messages that do not answer an earlier assistant tool call. */
function keepResolvableToolMessages(messages: Message[]): Message[] {
  const known = new Set<string>();
  const out: Message[] = [];
  for (const msg of messages) {
    if (msg.role === 'assistant') {
      for (const call of msg.toolCalls ?? []) known.add(call.id);
    }
    if (msg.role === 'tool' && !(msg.toolCallId && known.has(msg.toolCallId))) {
      log.debug({ toolCallId: msg.toolCallId }, 'skipping tool message without a matching tool call');
      continue;
    }
    out.push(msg);
  }
  return out;
}

function structural(parsed: unknown): Message[] | undefined {
  const canonical = canonicalEnvelopeSchema.safeParse(parsed);
  if (canonical.success) {
    if (canonical.data.version !== HISTORY_VERSION) {
      log.debug({ version: canonical.data.version }, 'reading canonical history from another version');
    }
    return fromCanonical(canonical.data.messages);
  }

  if (Array.isArray(parsed)) {
    if (parsed.length === 0) return [];
    const out: Message[] = [];
    let recognised = 0;
    for (const entry of parsed) {
      const decoded = fromLegacyEntry(entry);
      if (!decoded) {
        log.debug({ entry }, 'skipping malformed history entry');
        continue;
      }
      recognised++;
      out.push(...decoded);
    }
    return recognised > 0 ? out : undefined;
  }

  if (isRecord(parsed)) return fromLegacyEntry(parsed);
  return undefined;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function decodeHistory(raw: string | Buffer | null | undefined): Message[] {
  if (raw === null || raw === undefined) return [];
  const text = typeof raw === 'string' ? raw : raw.toString('utf-8');
  if (text.trim() === '') return [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return [{ role: 'assistant', content: text }];
  }

  const decoded = structural(parsed);
  if (!decoded) {
    log.debug('unrecognised history payload, keeping it as a single assistant message');
    return [{ role: 'assistant', content: text }];
  }
  const kept = keepResolvableToolMessages(decoded);
  if (decoded.length > 0 && kept.length === 0) {
    log.debug('every entry was an unresolvable tool message, keeping the payload as a single assistant message');
    return [{ role: 'assistant', content: text }];
  }
  return kept;
}

export function encodeHistory(messages: readonly Message[]): string {
  return JSON.stringify({
    format: HISTORY_FORMAT,
    version: HISTORY_VERSION,
    messages: messages.map((m) => withOptional(m.role, m.content, m.toolCallId, m.toolCalls)),
  });
}
