import type { ChatMessage, ChatRequest } from "../types.js";
import { ConfigError, NotFoundError, ValidationError } from "../errors.js";
import type { Credential, CredentialStore } from "../credentials/types.js";
import type { Conversation, ConversationStore, StoredMessage } from "../conversations/types.js";
import type { CompletionResult, Gateway, OpenedStream } from "./gateway.js";
import { KeyedSequencer } from "./sequencer.js";

export interface ChatParams {
  temperature?: number;
  maxTokens?: number;
  providerOptions?: Record<string, unknown>;
  signal?: AbortSignal;
}

export interface ConversationChatOptions {
  gateway: Gateway;
  credentials: CredentialStore;
  conversations: ConversationStore;
  sequencer?: KeyedSequencer;
}

interface Loaded {
  conversation: Conversation;
  credential: Credential;
  history: StoredMessage[];
}

/**
 * Chat inside a stored conversation: the conversation's own credential and
 * model, its system prompt and history as context, and both sides of the
 * exchange persisted. Calls on one conversation run one at a time.
 */
export class ConversationChat {
  private readonly gateway: Gateway;
  private readonly credentials: CredentialStore;
  private readonly conversations: ConversationStore;
  private readonly sequencer: KeyedSequencer;

  constructor(opts: ConversationChatOptions) {
    this.gateway = opts.gateway;
    this.credentials = opts.credentials;
    this.conversations = opts.conversations;
    this.sequencer = opts.sequencer ?? new KeyedSequencer();
  }

  async send(ownerId: string, conversationId: string, content: string, params: ChatParams = {}): Promise<CompletionResult> {
    requireContent(content);
    return this.sequencer.run(conversationId, async () => {
      const loaded = await this.load(ownerId, conversationId);
      await this.conversations.appendMessage({ conversationId, role: "user", content });
      const messages = [...buildHistory(loaded), { role: "user" as const, content }];
      return this.gateway.complete(ownerId, request(loaded.conversation, messages, params), {
        credential: loaded.credential,
        conversationId,
        signal: params.signal
      });
    });
  }

  /**
   * Streaming variant of `send`. The conversation stays locked until the
   * returned stream has ended and its reply is recorded.
   */
  async openStream(ownerId: string, conversationId: string, content: string, params: ChatParams = {}): Promise<OpenedStream> {
    requireContent(content);
    const release = await this.sequencer.acquire(conversationId);
    try {
      const loaded = await this.load(ownerId, conversationId);
      await this.conversations.appendMessage({ conversationId, role: "user", content });
      const messages = [...buildHistory(loaded), { role: "user" as const, content }];
      const opened = await this.gateway.openStream(ownerId, request(loaded.conversation, messages, params), {
        credential: loaded.credential,
        conversationId,
        signal: params.signal
      });
      void opened.fragments.done.then(release, release);
      return opened;
    } catch (error) {
      release();
      throw error;
    }
  }

  /** Drops the trailing assistant reply, if any, and asks again with the remaining history. */
  async regenerate(ownerId: string, conversationId: string, params: ChatParams = {}): Promise<CompletionResult> {
    return this.sequencer.run(conversationId, async () => {
      const loaded = await this.load(ownerId, conversationId);
      const last = loaded.history.at(-1);
      if (last?.role === "assistant") {
        await this.conversations.deleteMessage(conversationId, last.id);
        loaded.history = loaded.history.slice(0, -1);
      }
      if (loaded.history.at(-1)?.role !== "user") {
        throw new ValidationError("Conversation has no user message to answer");
      }
      return this.gateway.complete(ownerId, request(loaded.conversation, buildHistory(loaded), params), {
        credential: loaded.credential,
        conversationId,
        signal: params.signal
      });
    });
  }

  private async load(ownerId: string, conversationId: string): Promise<Loaded> {
    const conversation = await this.conversations.getConversation(conversationId, ownerId);
    if (!conversation) throw new NotFoundError("Conversation not found");
    if (!conversation.credentialId) throw new NotFoundError("Credential not found");

    const credential = await this.credentials.getCredential(conversation.credentialId, ownerId);
    if (!credential) throw new NotFoundError("Credential not found");
    if (!credential.isActive) throw new ConfigError("Credential is not active");

    const history = await this.conversations.getConversationHistory(conversationId);
    return { conversation, credential, history };
  }
}

/** System prompt first, then stored messages in creation order. */
export function buildHistory(loaded: { conversation: Conversation; history: readonly StoredMessage[] }): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (loaded.conversation.systemPrompt) {
    messages.push({ role: "system", content: loaded.conversation.systemPrompt });
  }
  for (const m of loaded.history) messages.push({ role: m.role, content: m.content });
  return messages;
}

function request(conversation: Conversation, messages: ChatMessage[], params: ChatParams): ChatRequest {
  return {
    model: conversation.model,
    messages,
    temperature: params.temperature,
    maxTokens: params.maxTokens,
    providerOptions: params.providerOptions
  };
}

function requireContent(content: string): void {
  if (!content.trim()) throw new ValidationError("Message content must not be empty");
}
