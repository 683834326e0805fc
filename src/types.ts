export type Role = "system" | "user" | "assistant";

export interface ChatMessage {
  readonly role: Role;
  readonly content: string;
}

export interface ChatRequest {
  model: string;
  messages: readonly ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  providerOptions?: Record<string, unknown>;
}

export interface Usage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ChatCompletionResult {
  content: string;
  model: string;
  usage?: Usage;
  finishReason?: string;
  costUsd?: number;
  providerMetadata: Record<string, unknown>;
}

export interface CallOpts {
  signal?: AbortSignal;
}

export interface RetryOpts {
  maxAttempts?: number;
  baseMs?: number;
  maxMs?: number;
  jitter?: "none" | "full";
  signal?: AbortSignal;
  maxTotalMs?: number;
  onRetry?: (info: { attempt: number; waitMs: number; error: unknown }) => void;
  statusRetry?: (status: number) => boolean;
}

export interface ModelPrice {
  inputPerMillion: number;
  outputPerMillion: number;
}

export const DEFAULT_TEMPERATURE = 0.7;

export type StreamOutcome = "completed" | "cancelled" | "failed";

// Events for observability
export type RelayEvent =
  | { type: "call.start"; provider: string; model: string; credentialId: string; requestId: string; stream: boolean }
  | { type: "call.success"; provider: string; model: string; requestId: string; durationMs: number; totalTokens?: number; costUsd?: number }
  | { type: "call.error"; provider: string; model: string; requestId: string; durationMs: number; error: unknown }
  | { type: "call.retry"; requestId: string; attempt: number; waitMs: number; error: unknown }
  | { type: "stream.end"; provider: string; model: string; requestId: string; outcome: StreamOutcome; fragments: number; durationMs: number }
  | { type: "usage.recorded"; credentialId: string; conversationId?: string; messageId?: string; totalTokens?: number; costUsd?: number }
  | { type: "usage.error"; credentialId: string; conversationId?: string; error: unknown }
  | { type: "auth.rejected"; reason: string }
  | { type: "models.cache"; key: string; hit: boolean };
