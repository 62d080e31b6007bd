/**
 * ToolCallLoop — runs one agent turn.
 *
 * The model is offered a tool only when the user's message names the value of
 * the tool's required argument. Each call goes through the shared cache, its
 * result is folded back into the history as a `tool` message, and the model
 * is asked again, up to `maxToolCalls` calls per turn. A turn may also start
 * from a preloaded lookup, which is folded in before the first model call.
 */

import { randomUUID } from 'node:crypto';
import {
  logger,
  withSpan,
  ToolBoundExceededError,
  UpstreamError,
  UpstreamUnavailableError,
  type SafehouseError,
  type ToolDefinition,
} from '@safehouse/shared';
import type { LlmClient, LlmCompletion } from './llm-client.js';
import type { MissionContextCache } from './mission-cache.js';
import { TurnStateMachine, type TurnState } from './turn-state.js';
import { withTimeout } from './timeout.js';
import type { Message, ResolvedPersona, ToolCall, ToolInvocation, ToolResult } from './types.js';

const log = logger.child({ module: 'tool-loop' });

export type ToolOutcome = Pick<ToolResult, 'status' | 'payload'>;

/** A tool the loop can offer, with the policy needed to gate it. */
export interface ToolHandler {
  definition: ToolDefinition;
  /** Argument whose value must appear in the user's message */
  requiredKey: string;
  /** Values of `requiredKey` the text references explicitly */
  referencedKeys(text: string): string[];
  /** Whether the text asks for a record this tool looks up, with or without a key */
  asksForRecord(text: string): boolean;
  /** Reply used when a record is asked for without a key */
  clarifyingQuestion: string;
  normalizeArgs?(args: Record<string, unknown>): Record<string, unknown>;
  /** Resolve to an error outcome for lookups that fail; throw only on backend faults */
  execute(args: Record<string, unknown>): Promise<ToolOutcome>;
}

export interface ToolCallLoopOptions {
  llm: LlmClient;
  cache: MissionContextCache;
  tools: ToolHandler[];
  /** Default 2 */
  maxToolCalls?: number;
  llmTimeoutMs?: number;
  toolTimeoutMs?: number;
}

/** A lookup made before the model is first asked, e.g. the mission named by a debrief. */
export interface Preload {
  tool: string;
  args: Record<string, unknown>;
}

export interface TurnInput {
  userMessage: string;
  /** Conversation so far, not including `userMessage` */
  history: readonly Message[];
  systemPrompt: string;
  persona: ResolvedPersona;
  preload?: Preload;
}

export interface TurnOutput {
  status: 'done' | 'failed';
  responseText: string;
  toolCallsMade: ToolInvocation[];
  /** New assistant and tool messages to persist after the user message */
  messages: Message[];
  states: readonly TurnState[];
  failure?: SafehouseError;
}

/** Stable JSON: object keys sorted at every depth. */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(',')}]`;
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export function toolCacheKey(name: string, args: Record<string, unknown>): string {
  return `${name}:${canonicalJson(args)}`;
}

export function failureText(persona: ResolvedPersona, failure: SafehouseError): string {
  if (failure instanceof ToolBoundExceededError) {
    return `${persona.displayName} here. I've run down as many leads as I can for one question. ` +
      'Narrow it down and ask me again.';
  }
  return `${persona.displayName} here. My line to headquarters has gone quiet, so I can't confirm anything right now. ` +
    'Try me again shortly.';
}

const EMPTY_REPLY = 'Nothing to report.';

export class ToolCallLoop {
  private readonly llm: LlmClient;
  private readonly cache: MissionContextCache;
  private readonly tools: Map<string, ToolHandler>;
  private readonly maxToolCalls: number;
  private readonly llmTimeoutMs: number;
  private readonly toolTimeoutMs: number;

  constructor(opts: ToolCallLoopOptions) {
    this.llm = opts.llm;
    this.cache = opts.cache;
    this.tools = new Map(opts.tools.map((t) => [t.definition.name, t]));
    this.maxToolCalls = opts.maxToolCalls ?? 2;
    this.llmTimeoutMs = opts.llmTimeoutMs ?? 30_000;
    this.toolTimeoutMs = opts.toolTimeoutMs ?? 10_000;
  }

  async run(input: TurnInput): Promise<TurnOutput> {
    const sm = new TurnStateMachine();
    const messages: Message[] = [];
    const toolCallsMade: ToolInvocation[] = [];

    const finish = (text: string): TurnOutput => {
      sm.transition('responding');
      const responseText = text.trim() || EMPTY_REPLY;
      messages.push({ role: 'assistant', content: responseText });
      sm.transition('done');
      return { status: 'done', responseText, toolCallsMade, messages, states: sm.history };
    };

    const fail = (failure: SafehouseError): TurnOutput => {
      sm.transition('failed');
      const responseText = failureText(input.persona, failure);
      messages.push({ role: 'assistant', content: responseText });
      log.warn({ err: failure, persona: input.persona.id, toolCalls: toolCallsMade.length }, 'turn failed');
      return { status: 'failed', responseText, toolCallsMade, messages, states: sm.history, failure };
    };

    sm.transition('deciding');

    // Policy: offer a tool only for keys the user named
    const referenced = new Map<string, string[]>();
    for (const [name, tool] of this.tools) {
      const keys = tool.referencedKeys(input.userMessage);
      if (keys.length > 0) referenced.set(name, keys);
    }
    const preloadCall = input.preload ? this.preloadCall(input.preload, referenced) : undefined;
    if (referenced.size === 0) {
      for (const tool of this.tools.values()) {
        if (tool.asksForRecord(input.userMessage)) {
          log.info({ tool: tool.definition.name }, 'record asked for without a key, asking for it');
          return finish(tool.clarifyingQuestion);
        }
      }
    }
    const offered = [...this.tools.values()]
      .filter((t) => referenced.has(t.definition.name))
      .map((t) => t.definition);

    const conversation: Message[] = [...input.history, { role: 'user', content: input.userMessage }];

    // Preloaded lookups are recorded like model-requested ones but do not count against the bound
    if (preloadCall) {
      sm.transition('invoking');
      const assistant: Message = { role: 'assistant', content: '', toolCalls: [preloadCall] };
      conversation.push(assistant);
      messages.push(assistant);
      toolCallsMade.push(preloadCall);
      sm.transition('awaiting');

      let result: ToolResult;
      try {
        result = await this.invoke(preloadCall, referenced);
      } catch (error) {
        if (isUpstreamFailure(error)) return fail(error);
        throw error;
      }
      const toolMessage: Message = { role: 'tool', content: result.payload, toolCallId: result.invocationId };
      conversation.push(toolMessage);
      messages.push(toolMessage);
      sm.transition('deciding');
    }
    const preloaded = preloadCall ? 1 : 0;

    for (;;) {
      let completion: LlmCompletion;
      try {
        completion = await withSpan('llm.complete', { tools: offered.length }, () =>
          withTimeout('llm call', this.llmTimeoutMs, (signal) =>
            this.llm.complete(input.systemPrompt, conversation, offered, { signal }),
          ),
        );
      } catch (error) {
        if (isUpstreamFailure(error)) return fail(error);
        throw error;
      }

      const requested = completion.requestedToolCalls;
      if (requested.length === 0) return finish(completion.text);

      if (toolCallsMade.length - preloaded + requested.length > this.maxToolCalls) {
        return fail(new ToolBoundExceededError(this.maxToolCalls));
      }

      sm.transition('invoking');
      const assistant: Message = { role: 'assistant', content: completion.text, toolCalls: requested };
      conversation.push(assistant);
      messages.push(assistant);
      toolCallsMade.push(...requested);

      const pending = requested.map((call) => this.invoke(call, referenced));
      sm.transition('awaiting');

      let results: ToolResult[];
      try {
        results = await Promise.all(pending);
      } catch (error) {
        if (isUpstreamFailure(error)) return fail(error);
        throw error;
      }

      for (const result of results) {
        const toolMessage: Message = { role: 'tool', content: result.payload, toolCallId: result.invocationId };
        conversation.push(toolMessage);
        messages.push(toolMessage);
      }
      sm.transition('deciding');
    }
  }

  /** Seed `referenced` with the preloaded key; undefined when the tool is not registered. */
  private preloadCall(preload: Preload, referenced: Map<string, string[]>): ToolCall | undefined {
    const tool = this.tools.get(preload.tool);
    if (!tool) {
      log.warn({ tool: preload.tool }, 'preload for an unregistered tool skipped');
      return undefined;
    }
    const args = tool.normalizeArgs ? tool.normalizeArgs(preload.args) : preload.args;
    const key = args[tool.requiredKey];
    if (typeof key !== 'string') {
      log.warn({ tool: preload.tool }, `preload without a string ${tool.requiredKey} skipped`);
      return undefined;
    }
    const keys = referenced.get(preload.tool) ?? [];
    if (!keys.includes(key)) referenced.set(preload.tool, [...keys, key]);
    return { id: `preload_${randomUUID()}`, name: preload.tool, arguments: args };
  }

  private async invoke(call: ToolCall, referenced: Map<string, string[]>): Promise<ToolResult> {
    const tool = this.tools.get(call.name);
    const keys = referenced.get(call.name);
    if (!tool || !keys) {
      log.warn({ tool: call.name }, 'model requested a tool that was not offered');
      return { invocationId: call.id, payload: `Tool ${call.name} is not available for this request.`, status: 'error' };
    }

    const args = tool.normalizeArgs ? tool.normalizeArgs(call.arguments) : call.arguments;
    const key = args[tool.requiredKey];
    if (typeof key !== 'string' || !keys.includes(key)) {
      log.warn({ tool: call.name, key }, 'model requested a key the user did not reference');
      return {
        invocationId: call.id,
        payload: `${tool.requiredKey} ${JSON.stringify(key ?? null)} was not given by the user. Ask which one they mean.`,
        status: 'error',
      };
    }

    const cacheKey = toolCacheKey(call.name, args);
    const result = await withSpan('tool.invoke', { tool: call.name }, () =>
      withTimeout(`tool ${call.name}`, this.toolTimeoutMs, () =>
        this.cache.get(cacheKey, async () => ({ invocationId: call.id, ...(await tool.execute(args)) })),
      ),
    );
    log.info({ tool: call.name, cacheKey, status: result.status }, 'tool call resolved');
    return { ...result, invocationId: call.id };
  }
}

function isUpstreamFailure(error: unknown): error is UpstreamError | UpstreamUnavailableError {
  return error instanceof UpstreamError || error instanceof UpstreamUnavailableError;
}
