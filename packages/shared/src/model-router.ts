/**
 * ModelRouter — routes chat requests to the appropriate LLM provider.
 *
 * Supports:
 *   - Anthropic (API key)
 *   - Ollama / OpenAI-compatible (openai SDK with custom baseURL)
 *
 * The router resolves role -> model definition -> provider adapter, handles
 * fallback chains, and normalises responses and failures into
 * provider-agnostic types. Every failure that leaves the router is an
 * `UpstreamUnavailableError` or an `UpstreamError`.
 */

import Anthropic from '@anthropic-ai/sdk';
import type {
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import { logger } from './logger.js';
import { CircuitBreaker } from './circuit-breaker.js';
import {
  SafehouseError,
  UpstreamError,
  UpstreamUnavailableError,
  isSafehouseError,
} from './errors.js';
import type {
  ModelRouterConfig,
  ModelDefinition,
  AnthropicProviderConfig,
  OllamaProviderConfig,
  OpenAICompatibleProviderConfig,
  ChatParams,
  ChatResponse,
  ChatContentBlock,
  ApiCallInfo,
} from './model-types.js';

const log = logger.child({ module: 'model-router' });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAbortError(err: unknown): err is Error {
  return err instanceof Error && err.name === 'AbortError';
}

// ---------------------------------------------------------------------------
// Provider adapter interface
// ---------------------------------------------------------------------------

interface ProviderAdapter {
  chat(model: ModelDefinition, params: ChatParams): Promise<ChatResponse>;
}

// ---------------------------------------------------------------------------
// Anthropic adapter
// ---------------------------------------------------------------------------

function toAnthropicMessages(params: ChatParams): Anthropic.Messages.MessageParam[] {
  return params.messages.map((msg): Anthropic.Messages.MessageParam => {
    if (typeof msg.content === 'string') {
      return { role: msg.role, content: msg.content };
    }
    const content = msg.content.map((block): Anthropic.Messages.ContentBlockParam => {
      switch (block.type) {
        case 'text':
          return { type: 'text', text: block.text };
        case 'tool_use':
          return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
        case 'tool_result':
          return {
            type: 'tool_result',
            tool_use_id: block.tool_use_id,
            content: block.content,
            ...(block.is_error && { is_error: true }),
          };
      }
    });
    return { role: msg.role, content };
  });
}

function toAnthropicTools(params: ChatParams): Anthropic.Messages.Tool[] | undefined {
  if (!params.tools || params.tools.length === 0) return undefined;
  return params.tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: { ...tool.input_schema },
  }));
}

function fromAnthropicContent(content: Anthropic.Messages.ContentBlock[]): ChatContentBlock[] {
  const blocks: ChatContentBlock[] = [];
  for (const block of content) {
    if (block.type === 'text') {
      blocks.push({ type: 'text', text: block.text });
    } else if (block.type === 'tool_use') {
      blocks.push({
        type: 'tool_use',
        id: block.id,
        name: block.name,
        input: isRecord(block.input) ? block.input : {},
      });
    } else {
      log.warn({ type: block.type }, 'dropping unsupported content block from API response');
    }
  }
  return blocks;
}

function classifyAnthropicError(err: unknown): SafehouseError {
  if (isSafehouseError(err)) return err;
  if (err instanceof Anthropic.APIConnectionError || isAbortError(err)) {
    return new UpstreamUnavailableError(`anthropic unreachable: ${err.message}`, { cause: err });
  }
  if (err instanceof Anthropic.APIError) {
    return new UpstreamError(`anthropic returned ${err.status ?? 'an error'}: ${err.message}`, { cause: err });
  }
  return new UpstreamError(`anthropic adapter failed: ${String(err)}`, { cause: err });
}

function createAnthropicAdapter(providerCfg: AnthropicProviderConfig): ProviderAdapter {
  const apiKey = providerCfg.apiKey || process.env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new Error('anthropic adapter: no credentials found');
  }
  const client = new Anthropic({ apiKey });
  log.info('anthropic adapter: using API key');

  return {
    async chat(model: ModelDefinition, params: ChatParams): Promise<ChatResponse> {
      try {
        const response = await client.messages.create(
          {
            model: model.modelName,
            max_tokens: params.maxTokens ?? model.maxTokens,
            system: params.system?.map((b) => ({ type: 'text', text: b.text })),
            tools: toAnthropicTools(params),
            messages: toAnthropicMessages(params),
          },
          { signal: params.signal },
        );

        return {
          content: fromAnthropicContent(response.content),
          stopReason: response.stop_reason ?? 'end_turn',
          model: response.model,
          usage: {
            inputTokens: response.usage.input_tokens,
            outputTokens: response.usage.output_tokens,
          },
        };
      } catch (err) {
        throw classifyAnthropicError(err);
      }
    },
  };
}

// ---------------------------------------------------------------------------
// Ollama / OpenAI-compatible adapter (uses openai SDK)
// ---------------------------------------------------------------------------

/** Convert Anthropic-style system/messages to OpenAI chat messages */
export function convertToOpenAIMessages(params: ChatParams): ChatCompletionMessageParam[] {
  const out: ChatCompletionMessageParam[] = [];

  // System blocks -> single system message
  if (params.system && params.system.length > 0) {
    out.push({
      role: 'system',
      content: params.system.map((b) => b.text).join('\n\n'),
    });
  }

  for (const msg of params.messages) {
    if (typeof msg.content === 'string') {
      out.push(msg.role === 'user'
        ? { role: 'user', content: msg.content }
        : { role: 'assistant', content: msg.content });
      continue;
    }

    const text = msg.content
      .filter((b): b is { type: 'text'; text: string } => b.type === 'text')
      .map((b) => b.text)
      .join('\n');

    if (msg.role === 'assistant') {
      const toolCalls = msg.content
        .filter((b): b is Extract<ChatContentBlock, { type: 'tool_use' }> => b.type === 'tool_use')
        .map((b) => ({
          id: b.id,
          type: 'function' as const,
          function: { name: b.name, arguments: JSON.stringify(b.input) },
        }));
      out.push({
        role: 'assistant',
        content: text || null,
        ...(toolCalls.length > 0 && { tool_calls: toolCalls }),
      });
      continue;
    }

    // Tool results travel as their own 'tool' role messages
    for (const block of msg.content) {
      if (block.type === 'tool_result') {
        out.push({ role: 'tool', tool_call_id: block.tool_use_id, content: block.content });
      }
    }
    if (text) out.push({ role: 'user', content: text });
  }

  return out;
}

function toOpenAITools(params: ChatParams): ChatCompletionTool[] | undefined {
  if (!params.tools || params.tools.length === 0) return undefined;
  return params.tools.map((tool) => ({
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: { ...tool.input_schema },
    },
  }));
}

function parseToolArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    log.warn({ raw }, 'tool call arguments were not valid JSON');
    return {};
  }
}

async function createOpenAICompatibleAdapter(
  providerCfg: OllamaProviderConfig | OpenAICompatibleProviderConfig,
): Promise<ProviderAdapter> {
  // Dynamic import — only loaded if this provider is actually used
  const { default: OpenAI } = await import('openai');

  const baseURL =
    providerCfg.provider === 'ollama'
      ? providerCfg.baseURL ?? 'http://localhost:11434/v1'
      : providerCfg.baseURL;

  const apiKey =
    providerCfg.provider === 'openai-compatible'
      ? providerCfg.apiKey ?? 'not-needed'
      : 'not-needed';

  const client = new OpenAI({ baseURL, apiKey });

  log.info({ baseURL, provider: providerCfg.provider }, 'openai-compatible adapter: initialized');

  const classify = (err: unknown): SafehouseError => {
    if (isSafehouseError(err)) return err;
    if (err instanceof OpenAI.APIConnectionError || isAbortError(err)) {
      return new UpstreamUnavailableError(`${providerCfg.provider} unreachable: ${err.message}`, { cause: err });
    }
    if (err instanceof OpenAI.APIError) {
      return new UpstreamError(`${providerCfg.provider} returned ${err.status ?? 'an error'}: ${err.message}`, { cause: err });
    }
    return new UpstreamError(`${providerCfg.provider} adapter failed: ${String(err)}`, { cause: err });
  };

  return {
    async chat(model: ModelDefinition, params: ChatParams): Promise<ChatResponse> {
      try {
        const response = await client.chat.completions.create(
          {
            model: model.modelName,
            max_tokens: params.maxTokens ?? model.maxTokens,
            messages: convertToOpenAIMessages(params),
            tools: toOpenAITools(params),
          },
          { signal: params.signal },
        );

        const choice = response.choices[0];
        if (!choice) {
          throw new UpstreamError('openai-compatible adapter: no choices in response');
        }

        const content: ChatContentBlock[] = [];
        if (choice.message.content) {
          content.push({ type: 'text', text: choice.message.content });
        }
        for (const call of choice.message.tool_calls ?? []) {
          content.push({
            type: 'tool_use',
            id: call.id,
            name: call.function.name,
            input: parseToolArguments(call.function.arguments),
          });
        }

        const finish = choice.finish_reason;
        return {
          content,
          stopReason: finish === 'stop' ? 'end_turn' : finish === 'tool_calls' ? 'tool_use' : finish ?? 'end_turn',
          model: response.model,
          usage: response.usage
            ? {
                inputTokens: response.usage.prompt_tokens,
                outputTokens: response.usage.completion_tokens,
              }
            : undefined,
        };
      } catch (err) {
        throw classify(err);
      }
    },
  };
}

// ---------------------------------------------------------------------------
// ModelRouter class
// ---------------------------------------------------------------------------

export class ModelRouter {
  private adapters: Map<string, ProviderAdapter> = new Map();
  private circuitBreakers: Map<string, CircuitBreaker> = new Map();
  private readonly config: ModelRouterConfig;
  private onApiCall?: (info: ApiCallInfo) => void;

  private constructor(config: ModelRouterConfig) {
    this.config = config;
  }

  /**
   * Factory: create and initialise a ModelRouter.
   * Eagerly creates the Anthropic adapter; others are lazy.
   */
  static async create(config: ModelRouterConfig): Promise<ModelRouter> {
    const router = new ModelRouter(config);

    const anthropicCfg = config.providers['anthropic'];
    if (anthropicCfg && anthropicCfg.provider === 'anthropic') {
      router.adapters.set('anthropic', createAnthropicAdapter(anthropicCfg));
    }

    return router;
  }

  /** Set a callback for API call audit logging */
  setOnApiCall(cb: (info: ApiCallInfo) => void): void {
    this.onApiCall = cb;
  }

  private getOrCreateBreaker(provider: string): CircuitBreaker {
    let cb = this.circuitBreakers.get(provider);
    if (!cb) {
      cb = new CircuitBreaker({
        name: `model-router-${provider}`,
        failureThreshold: 5,
        resetTimeoutMs: 30_000,
        // A caller-side abort says nothing about the provider's health
        isFailure: (err) => !(err instanceof UpstreamUnavailableError && isAbortError(err.cause)),
      });
      this.circuitBreakers.set(provider, cb);
    }
    return cb;
  }

  private resolveModel(params: ChatParams): ModelDefinition {
    const role = params.role ?? 'agent';
    const modelId = params.modelOverride ?? this.config.roles[role];

    if (!modelId) {
      throw new Error(`model-router: no model configured for role '${role}'`);
    }

    const model = this.config.models.find((m) => m.id === modelId);
    if (!model) {
      throw new Error(`model-router: unknown model id '${modelId}' for role '${role}'`);
    }

    return model;
  }

  private async getAdapter(provider: string): Promise<ProviderAdapter> {
    const existing = this.adapters.get(provider);
    if (existing) return existing;

    const providerCfg = this.config.providers[provider];
    if (!providerCfg) {
      throw new UpstreamUnavailableError(`model-router: no provider config for '${provider}'`);
    }

    if (providerCfg.provider === 'ollama' || providerCfg.provider === 'openai-compatible') {
      const adapter = await createOpenAICompatibleAdapter(providerCfg);
      this.adapters.set(provider, adapter);
      return adapter;
    }

    throw new UpstreamUnavailableError(`model-router: cannot create adapter for provider '${provider}'`);
  }

  /** Chat call with fallback support */
  async chat(params: ChatParams): Promise<ChatResponse> {
    const model = this.resolveModel(params);
    const modelsToTry = [model];

    if (this.config.fallbackChain) {
      for (const fbId of this.config.fallbackChain) {
        if (fbId === model.id) continue;
        const fbModel = this.config.models.find((m) => m.id === fbId);
        if (fbModel) modelsToTry.push(fbModel);
      }
    }

    let lastError: SafehouseError = new UpstreamUnavailableError('all models in fallback chain failed');
    for (const m of modelsToTry) {
      if (params.signal?.aborted) break;
      const start = Date.now();
      try {
        const adapter = await this.getAdapter(m.provider);
        const cb = this.getOrCreateBreaker(m.provider);
        log.info({ model: m.modelName, provider: m.provider, role: params.role ?? 'agent' }, 'routing chat request');
        const result = await cb.execute(() => adapter.chat(m, params));
        this.onApiCall?.({
          provider: m.provider,
          model: m.modelName,
          durationMs: Date.now() - start,
          inputTokens: result.usage?.inputTokens,
          outputTokens: result.usage?.outputTokens,
        });
        return result;
      } catch (err) {
        lastError = isSafehouseError(err) ? err : new UpstreamError(String(err), { cause: err });
        this.onApiCall?.({ provider: m.provider, model: m.modelName, durationMs: Date.now() - start, error: lastError.message });
        log.warn({ err, model: m.modelName, provider: m.provider }, 'chat request failed, trying fallback');
      }
    }

    throw lastError;
  }
}
