import {
  logger,
  withSpan,
  NotFoundError,
  ok,
  err,
  type Features,
  type ResponseEnvelope,
  type Result,
} from '@safehouse/shared';
import type { ConnectionRegistry } from './connection-registry.js';
import type { ConversationStore, PersonaLookup } from './conversation-store.js';
import { buildSystemPrompt } from './persona-repository.js';
import { MISSION_TOOL_NAME } from './mission-tools.js';
import type { Preload, ToolCallLoop } from './tool-loop.js';
import type { ConversationLog, Message, ToolInvocation } from './types.js';

const log = logger.child({ module: 'chat-session' });

export interface TurnRequest {
  personaId: string;
  /** Omitted: continue the persona's latest conversation, or start one */
  conversationId?: string;
  message: string;
  /** Connection that sent the message, if it came over a socket */
  originConnectionId?: string;
}

export interface DebriefRequest extends TurnRequest {
  missionId: string;
}

export interface TurnResult {
  personaId: string;
  personaName: string;
  conversationId: string;
  responseText: string;
  status: 'done' | 'failed';
  toolCalls: ToolInvocation[];
}

export interface ChatSessionOptions {
  personas: PersonaLookup;
  store: ConversationStore;
  loop: ToolCallLoop;
  registry: ConnectionRegistry;
  features: Features;
}

/**
 * One persona-bound chat turn from message to delivery. The turn holds the
 * conversation lock from the history read to the final append; delivery to
 * sockets happens after the lock is released.
 */
export class ChatSession {
  private readonly personas: PersonaLookup;
  private readonly store: ConversationStore;
  private readonly loop: ToolCallLoop;
  private readonly registry: ConnectionRegistry;
  private readonly features: Features;

  constructor(opts: ChatSessionOptions) {
    this.personas = opts.personas;
    this.store = opts.store;
    this.loop = opts.loop;
    this.registry = opts.registry;
    this.features = opts.features;
  }

  runTurn(req: TurnRequest): Promise<Result<TurnResult, NotFoundError>> {
    return withSpan('chat.turn', { personaId: req.personaId }, () => this.turn(req));
  }

  /** A turn that starts from the named mission's file, fetched through the shared cache. */
  runDebrief(req: DebriefRequest): Promise<Result<TurnResult, NotFoundError>> {
    return withSpan('chat.debrief', { personaId: req.personaId, missionId: req.missionId }, () =>
      this.turn(req, { tool: MISSION_TOOL_NAME, args: { mission_id: req.missionId } }),
    );
  }

  private async turn(req: TurnRequest, preload?: Preload): Promise<Result<TurnResult, NotFoundError>> {
    const persona = await this.personas.resolvePersona(req.personaId);
    if (!persona.ok) return persona;

    const conversation = await this.resolveConversation(req.personaId, req.conversationId);
    if (!conversation.ok) return conversation;
    const conversationId = conversation.value.id;

    const systemPrompt = buildSystemPrompt(persona.value, {
      toolsEnabled: this.features.isEnabled('missionTools'),
    });

    const turn = await this.store.withConversationLock(conversationId, async (tx) => {
      const current = await tx.read();
      if (!current.ok) return current;

      const userMessage: Message = { role: 'user', content: req.message };
      const appendedUser = await tx.append([userMessage]);
      if (!appendedUser.ok) return appendedUser;

      const output = await this.loop.run({
        userMessage: req.message,
        history: current.value.messages,
        systemPrompt,
        persona: persona.value,
        preload,
      });

      const appended = await tx.append(output.messages);
      if (!appended.ok) return appended;
      return ok(output);
    });
    if (!turn.ok) return turn;

    const result: TurnResult = {
      personaId: persona.value.id,
      personaName: persona.value.displayName,
      conversationId,
      responseText: turn.value.responseText,
      status: turn.value.status,
      toolCalls: turn.value.toolCallsMade,
    };
    log.info(
      { personaId: result.personaId, conversationId, status: result.status, toolCalls: result.toolCalls.length },
      'turn complete',
    );

    await this.deliver(req, result);
    return ok(result);
  }

  private async resolveConversation(
    personaId: string,
    conversationId: string | undefined,
  ): Promise<Result<ConversationLog, NotFoundError>> {
    if (conversationId === undefined) return this.store.getOrCreateForOwner(personaId);

    const found = await this.store.get(conversationId);
    if (!found.ok) return found;
    // Another persona's conversation is reported as missing
    if (found.value.ownerId !== personaId) return err(new NotFoundError('conversation', conversationId));
    return found;
  }

  private async deliver(req: TurnRequest, result: TurnResult): Promise<void> {
    const envelope: ResponseEnvelope = {
      type: 'response',
      personaId: result.personaId,
      personaName: result.personaName,
      message: req.message,
      response: result.responseText,
      conversationId: result.conversationId,
      toolCalls: result.toolCalls.map((call) => ({ id: call.id, name: call.name, arguments: call.arguments })),
    };

    if (this.features.isEnabled('conversationBroadcast')) {
      if (req.originConnectionId) this.registry.attachConversation(req.originConnectionId, result.conversationId);
      const delivered = await this.registry.broadcastToConversation(result.conversationId, envelope);
      log.debug({ conversationId: result.conversationId, delivered }, 'response broadcast');
      return;
    }

    if (req.originConnectionId) {
      const delivered = await this.registry.sendTo(req.originConnectionId, envelope);
      if (!delivered) log.info({ connectionId: req.originConnectionId }, 'origin connection gone, response not delivered');
    }
  }
}
