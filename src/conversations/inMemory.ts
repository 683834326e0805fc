import { randomUUID } from "node:crypto";
import type {
  AppendMessageInput,
  Conversation,
  ConversationStore,
  NewConversation,
  StoredMessage
} from "./types.js";

export class InMemoryConversationStore implements ConversationStore {
  private readonly conversations = new Map<string, Conversation>();
  private readonly messages = new Map<string, StoredMessage[]>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async getConversation(id: string, ownerId: string): Promise<Conversation | undefined> {
    const c = this.conversations.get(id);
    return c && c.ownerId === ownerId ? { ...c } : undefined;
  }

  async getConversationHistory(conversationId: string): Promise<StoredMessage[]> {
    return (this.messages.get(conversationId) ?? []).map((m) => ({ ...m }));
  }

  async appendMessage(input: AppendMessageInput): Promise<StoredMessage> {
    const message: StoredMessage = {
      id: randomUUID(),
      conversationId: input.conversationId,
      role: input.role,
      content: input.content,
      promptTokens: input.usage?.promptTokens ?? null,
      completionTokens: input.usage?.completionTokens ?? null,
      totalTokens: input.usage?.totalTokens ?? null,
      cost: input.cost ?? null,
      metadata: input.metadata ?? null,
      createdAt: this.now()
    };
    const list = this.messages.get(input.conversationId) ?? [];
    list.push(message);
    this.messages.set(input.conversationId, list);

    const conversation = this.conversations.get(input.conversationId);
    if (conversation) conversation.updatedAt = message.createdAt;
    return { ...message };
  }

  async deleteMessage(conversationId: string, messageId: string): Promise<boolean> {
    const list = this.messages.get(conversationId);
    if (!list) return false;
    const idx = list.findIndex((m) => m.id === messageId);
    if (idx < 0) return false;
    list.splice(idx, 1);
    return true;
  }

  async createConversation(input: NewConversation): Promise<Conversation> {
    const now = this.now();
    const conversation: Conversation = {
      id: randomUUID(),
      ownerId: input.ownerId,
      credentialId: input.credentialId,
      model: input.model,
      title: input.title ?? "New Conversation",
      systemPrompt: input.systemPrompt ?? null,
      createdAt: now,
      updatedAt: now
    };
    this.conversations.set(conversation.id, conversation);
    this.messages.set(conversation.id, []);
    return { ...conversation };
  }
}
