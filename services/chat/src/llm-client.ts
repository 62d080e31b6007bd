import {
  logger,
  type ChatContentBlock,
  type ChatMessage,
  type ModelRouter,
  type ToolDefinition,
} from '@safehouse/shared';
import { contentText, type Message, type ToolCall } from './types.js';

const log = logger.child({ module: 'llm-client' });

export interface LlmCompletion {
  text: string;
  requestedToolCalls: ToolCall[];
}

/** The model behind a persona. Implementations throw Upstream* errors on failure. */
export interface LlmClient {
  complete(
    systemPrompt: string,
    history: readonly Message[],
    tools: readonly ToolDefinition[],
    opts?: { signal?: AbortSignal },
  ): Promise<LlmCompletion>;
}

/**
 * Map canonical messages onto provider chat messages. System messages found in
 * the history join the system prompt; tool results become tool_result blocks
 * on a user turn, merged when several answer the same assistant turn.
 */
export function toChatMessages(history: readonly Message[]): { system: string[]; messages: ChatMessage[] } {
  const system: string[] = [];
  const messages: ChatMessage[] = [];

  for (const msg of history) {
    const text = contentText(msg.content);
    switch (msg.role) {
      case 'system':
        if (text) system.push(text);
        break;
      case 'user':
        messages.push({ role: 'user', content: text });
        break;
      case 'assistant': {
        const blocks: ChatContentBlock[] = [];
        if (text) blocks.push({ type: 'text', text });
        for (const call of msg.toolCalls ?? []) {
          blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: call.arguments });
        }
        if (blocks.length > 0) messages.push({ role: 'assistant', content: blocks });
        break;
      }
      case 'tool': {
        if (!msg.toolCallId) break;
        const block: ChatContentBlock = { type: 'tool_result', tool_use_id: msg.toolCallId, content: text };
        const last = messages[messages.length - 1];
        if (last && last.role === 'user' && Array.isArray(last.content) && last.content.every((b) => b.type === 'tool_result')) {
          last.content.push(block);
        } else {
          messages.push({ role: 'user', content: [block] });
        }
        break;
      }
    }
  }

  return { system, messages };
}

/** LlmClient backed by the shared model router. */
export function createRouterLlmClient(router: Pick<ModelRouter, 'chat'>): LlmClient {
  return {
    async complete(systemPrompt, history, tools, opts) {
      const { system, messages } = toChatMessages(history);
      const response = await router.chat({
        role: 'agent',
        system: [systemPrompt, ...system].map((text) => ({ type: 'text' as const, text })),
        messages,
        tools: tools.length > 0 ? [...tools] : undefined,
        signal: opts?.signal,
      });

      const texts: string[] = [];
      const requestedToolCalls: ToolCall[] = [];
      for (const block of response.content) {
        if (block.type === 'text') texts.push(block.text);
        else if (block.type === 'tool_use') {
          requestedToolCalls.push({ id: block.id, name: block.name, arguments: block.input });
        }
      }

      log.debug(
        { model: response.model, stopReason: response.stopReason, toolCalls: requestedToolCalls.length },
        'completion received',
      );
      return { text: texts.join(''), requestedToolCalls };
    },
  };
}
