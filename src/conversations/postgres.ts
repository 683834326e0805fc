import { randomUUID } from "node:crypto";
import { z } from "zod";
import { DEFAULT_SCHEMA, resolvePool, type PgQueryable, type PgStoreOptions } from "../core/pg.js";
import type {
  AppendMessageInput,
  Conversation,
  ConversationStore,
  NewConversation,
  StoredMessage
} from "./types.js";

const idSchema = z.union([z.string(), z.number()]).transform(String);
const intOrNull = z.coerce.number().int().nullable();

const ConversationRowSchema = z.object({
  id: idSchema,
  user_id: idSchema,
  api_key_id: idSchema.nullable(),
  model: z.string(),
  title: z.string(),
  system_prompt: z.string().nullable(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date()
});

const MessageRowSchema = z.object({
  id: idSchema,
  conversation_id: idSchema,
  role: z.enum(["system", "user", "assistant"]),
  content: z.string(),
  prompt_tokens: intOrNull,
  completion_tokens: intOrNull,
  total_tokens: intOrNull,
  cost: z.coerce.number().nullable(),
  metadata: z.record(z.unknown()).nullable(),
  created_at: z.coerce.date()
});

const CONVERSATION_COLUMNS = "id, user_id, api_key_id, model, title, system_prompt, created_at, updated_at";
const MESSAGE_COLUMNS =
  "id, conversation_id, role, content, prompt_tokens, completion_tokens, total_tokens, cost, metadata, created_at";

function toConversation(row: unknown): Conversation {
  const r = ConversationRowSchema.parse(row);
  return {
    id: r.id,
    ownerId: r.user_id,
    credentialId: r.api_key_id,
    model: r.model,
    title: r.title,
    systemPrompt: r.system_prompt,
    createdAt: r.created_at,
    updatedAt: r.updated_at
  };
}

function toMessage(row: unknown): StoredMessage {
  const r = MessageRowSchema.parse(row);
  return {
    id: r.id,
    conversationId: r.conversation_id,
    role: r.role,
    content: r.content,
    promptTokens: r.prompt_tokens,
    completionTokens: r.completion_tokens,
    totalTokens: r.total_tokens,
    cost: r.cost,
    metadata: r.metadata,
    createdAt: r.created_at
  };
}

/** `conversations` and `messages` tables; both are expected to exist. */
export class PostgresConversationStore implements ConversationStore {
  private readonly pool: PgQueryable;
  private readonly conversations: string;
  private readonly messages: string;

  constructor(opts: PgStoreOptions = {}) {
    this.pool = resolvePool(opts);
    const schema = opts.schema ?? DEFAULT_SCHEMA;
    this.conversations = `${schema}.conversations`;
    this.messages = `${schema}.messages`;
  }

  async getConversation(id: string, ownerId: string): Promise<Conversation | undefined> {
    const res = await this.pool.query(
      `SELECT ${CONVERSATION_COLUMNS} FROM ${this.conversations} WHERE id = $1 AND user_id = $2`,
      [id, ownerId]
    );
    return res.rows.length > 0 ? toConversation(res.rows[0]) : undefined;
  }

  async getConversationHistory(conversationId: string): Promise<StoredMessage[]> {
    const res = await this.pool.query(
      `SELECT ${MESSAGE_COLUMNS} FROM ${this.messages}
       WHERE conversation_id = $1
       ORDER BY created_at ASC, id ASC`,
      [conversationId]
    );
    return res.rows.map(toMessage);
  }

  async appendMessage(input: AppendMessageInput): Promise<StoredMessage> {
    const res = await this.pool.query(
      `INSERT INTO ${this.messages} (id, conversation_id, role, content, prompt_tokens, completion_tokens, total_tokens, cost, metadata, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, NOW())
       RETURNING ${MESSAGE_COLUMNS}`,
      [
        randomUUID(),
        input.conversationId,
        input.role,
        input.content,
        input.usage?.promptTokens ?? null,
        input.usage?.completionTokens ?? null,
        input.usage?.totalTokens ?? null,
        input.cost ?? null,
        input.metadata ? JSON.stringify(input.metadata) : null
      ]
    );
    await this.pool.query(`UPDATE ${this.conversations} SET updated_at = NOW() WHERE id = $1`, [input.conversationId]);
    return toMessage(res.rows[0]);
  }

  async deleteMessage(conversationId: string, messageId: string): Promise<boolean> {
    const res = await this.pool.query(
      `DELETE FROM ${this.messages} WHERE id = $1 AND conversation_id = $2`,
      [messageId, conversationId]
    );
    return (res.rowCount ?? 0) > 0;
  }

  async createConversation(input: NewConversation): Promise<Conversation> {
    const res = await this.pool.query(
      `INSERT INTO ${this.conversations} (id, user_id, api_key_id, model, title, system_prompt, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, NOW(), NOW())
       RETURNING ${CONVERSATION_COLUMNS}`,
      [randomUUID(), input.ownerId, input.credentialId, input.model, input.title ?? "New Conversation", input.systemPrompt ?? null]
    );
    return toConversation(res.rows[0]);
  }
}
