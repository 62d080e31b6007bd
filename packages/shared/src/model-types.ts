/**
 * Model Router types — provider-agnostic model configuration and routing.
 *
 * These types define the configuration schema for routing LLM requests
 * to different providers (Anthropic, Ollama, OpenAI-compatible).
 */

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

export type ModelProvider = 'anthropic' | 'ollama' | 'openai-compatible';

export interface AnthropicProviderConfig {
  provider: 'anthropic';
  apiKey?: string;
}

export interface OllamaProviderConfig {
  provider: 'ollama';
  /** Base URL for the Ollama server (default: http://localhost:11434/v1) */
  baseURL?: string;
}

export interface OpenAICompatibleProviderConfig {
  provider: 'openai-compatible';
  apiKey?: string;
  baseURL: string;
}

export type ProviderConfig =
  | AnthropicProviderConfig
  | OllamaProviderConfig
  | OpenAICompatibleProviderConfig;

// ---------------------------------------------------------------------------
// Model definition
// ---------------------------------------------------------------------------

export interface ModelDefinition {
  /** Unique id used to reference this model in roles (e.g. "llama3.2") */
  id: string;
  /** Model string sent to the provider API */
  modelName: string;
  provider: ModelProvider;
  /** Max tokens for this model's responses */
  maxTokens: number;
}

/** Named roles that map to model IDs */
export interface ModelRoles {
  /** Model that voices the personas */
  agent: string;
}

export interface ModelRouterConfig {
  /** Provider configurations keyed by provider name */
  providers: Record<string, ProviderConfig>;
  models: ModelDefinition[];
  roles: ModelRoles;
  /** Ordered list of model IDs to try if the primary model fails */
  fallbackChain?: string[];
}

// ---------------------------------------------------------------------------
// Provider-agnostic chat interfaces
// ---------------------------------------------------------------------------

/** A single content block in a message */
export type ChatContentBlock =
  | { type: 'text'; text: string }
  | { type: 'tool_use'; id: string; name: string; input: Record<string, unknown> }
  | { type: 'tool_result'; tool_use_id: string; content: string; is_error?: boolean };

/** A message in the chat history */
export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string | ChatContentBlock[];
}

/** System block for the prompt */
export interface SystemBlock {
  type: 'text';
  text: string;
}

/** Tool definition (Anthropic format) */
export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties?: Record<string, unknown>;
    required?: string[];
  };
}

/** Parameters for a chat request routed through the ModelRouter */
export interface ChatParams {
  /** Which role to use for model selection (defaults to 'agent') */
  role?: keyof ModelRoles;
  /** Override the model ID for this specific request */
  modelOverride?: string;
  system?: SystemBlock[];
  messages: ChatMessage[];
  tools?: ToolDefinition[];
  /** Maximum tokens in the response */
  maxTokens?: number;
  /** Aborts the in-flight provider request */
  signal?: AbortSignal;
}

/** Response from a chat call */
export interface ChatResponse {
  content: ChatContentBlock[];
  /** Why the model stopped generating */
  stopReason: 'end_turn' | 'tool_use' | 'max_tokens' | string;
  /** Model ID that was actually used */
  model: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

/** Audit information reported after every provider call */
export interface ApiCallInfo {
  provider: string;
  model: string;
  durationMs: number;
  inputTokens?: number;
  outputTokens?: number;
  error?: string;
}
