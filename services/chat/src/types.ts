/**
 * Canonical in-memory shapes for conversations and tool calls.
 */

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface TextPart {
  type: 'text';
  text: string;
}

export type ContentPart = TextPart;

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/**
 * A single entry in a conversation log. A `tool` message always carries the
 * `toolCallId` of an earlier assistant `toolCalls` entry.
 */
export interface Message {
  role: MessageRole;
  content: string | ContentPart[];
  toolCallId?: string;
  toolCalls?: ToolCall[];
}

export interface ConversationLog {
  id: string;
  /** Persona that owns this conversation */
  ownerId: string;
  title?: string;
  messages: Message[];
  createdAt: string;
  updatedAt: string;
}

export interface ConversationSummary {
  id: string;
  ownerId: string;
  title?: string;
  messageCount: number;
  createdAt: string;
  updatedAt: string;
}

export type ToolInvocation = ToolCall;

export interface ToolResult {
  invocationId: string;
  payload: string;
  status: 'success' | 'error';
}

export interface ResolvedPersona {
  id: string;
  displayName: string;
  promptFacts: string[];
}

/** Flatten message content to plain text. */
export function contentText(content: Message['content']): string {
  if (typeof content === 'string') return content;
  return content.map((part) => part.text).join('');
}
