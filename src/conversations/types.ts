import type { Role, Usage } from "../types.js";

export interface Conversation {
  id: string;
  ownerId: string;
  /** Credential the conversation talks through; null once that credential is deleted. */
  credentialId: string | null;
  model: string;
  title: string;
  systemPrompt: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface StoredMessage {
  id: string;
  conversationId: string;
  role: Role;
  content: string;
  promptTokens: number | null;
  completionTokens: number | null;
  totalTokens: number | null;
  cost: number | null;
  metadata: Record<string, unknown> | null;
  createdAt: Date;
}

export interface AppendMessageInput {
  conversationId: string;
  role: Role;
  content: string;
  usage?: Usage | null;
  cost?: number | null;
  metadata?: Record<string, unknown> | null;
}

export interface NewConversation {
  ownerId: string;
  credentialId: string | null;
  model: string;
  title?: string;
  systemPrompt?: string | null;
}

/** Message log of conversations. Messages are append-only apart from `deleteMessage`. */
export interface ConversationStore {
  getConversation(id: string, ownerId: string): Promise<Conversation | undefined>;
  /** Messages in creation order. */
  getConversationHistory(conversationId: string): Promise<StoredMessage[]>;
  appendMessage(input: AppendMessageInput): Promise<StoredMessage>;
  deleteMessage(conversationId: string, messageId: string): Promise<boolean>;
  createConversation(input: NewConversation): Promise<Conversation>;
}
