/**
 * Envelopes exchanged with clients over the chat WebSocket.
 * Every frame is a JSON object discriminated by `type`.
 */

export interface ToolCallSummary {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface SystemEnvelope {
  type: 'system';
  message: string;
  personaId?: string;
  conversationId?: string;
}

export interface ResponseEnvelope {
  type: 'response';
  personaId: string;
  personaName: string;
  /** The user message this turn answered */
  message: string;
  response: string;
  conversationId: string;
  toolCalls: ToolCallSummary[];
}

export interface ErrorEnvelope {
  type: 'error';
  message: string;
}

export type ServerEnvelope = SystemEnvelope | ResponseEnvelope | ErrorEnvelope;

/** Inbound frame from a client */
export interface ClientMessage {
  message: string;
}
