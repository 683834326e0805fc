import type { ChatCompletionResult, RelayEvent, StreamOutcome } from "../types.js";
import type { CredentialStore } from "../credentials/types.js";
import type { ConversationStore, StoredMessage } from "../conversations/types.js";
import { combineListeners } from "../telemetry/events.js";

export interface ExchangeContext {
  credentialId: string;
  provider: string;
  model: string;
  /** Present on the conversation path; gateway calls have none. */
  conversationId?: string;
}

export interface UsageRecorderOptions {
  credentials: CredentialStore;
  conversations?: ConversationStore;
  onEvent?: (e: RelayEvent) => void;
  now?: () => Date;
}

/**
 * Turns a finished exchange into its persisted assistant message and marks
 * the credential as used. Buffered results are recorded directly; streams go
 * through a `StreamRecording`, which records at most once.
 */
export class UsageRecorder {
  private readonly onEvent?: (e: RelayEvent) => void;

  constructor(private readonly opts: UsageRecorderOptions) {
    this.onEvent = opts.onEvent && combineListeners(opts.onEvent);
  }

  async recordCompletion(ctx: ExchangeContext, result: ChatCompletionResult): Promise<StoredMessage | undefined> {
    const message = await this.persist(ctx, {
      content: result.content,
      usage: result.usage ?? null,
      cost: result.costUsd ?? null,
      metadata: result.providerMetadata
    });
    this.onEvent?.({
      type: "usage.recorded",
      credentialId: ctx.credentialId,
      conversationId: ctx.conversationId,
      messageId: message?.id,
      totalTokens: result.usage?.totalTokens,
      costUsd: result.costUsd
    });
    return message;
  }

  beginStream(ctx: ExchangeContext): StreamRecording {
    return new StreamRecording((content, outcome) => this.recordStream(ctx, content, outcome));
  }

  private async recordStream(ctx: ExchangeContext, content: string, outcome: StreamOutcome): Promise<StoredMessage | undefined> {
    const message = await this.persist(ctx, {
      content,
      usage: null,
      cost: null,
      metadata: { provider: ctx.provider, model: ctx.model, stream: true, outcome }
    });
    this.onEvent?.({
      type: "usage.recorded",
      credentialId: ctx.credentialId,
      conversationId: ctx.conversationId,
      messageId: message?.id
    });
    return message;
  }

  private async persist(
    ctx: ExchangeContext,
    entry: {
      content: string;
      usage: ChatCompletionResult["usage"] | null;
      cost: number | null;
      metadata: Record<string, unknown>;
    }
  ): Promise<StoredMessage | undefined> {
    let message: StoredMessage | undefined;
    if (ctx.conversationId && this.opts.conversations) {
      message = await this.opts.conversations.appendMessage({
        conversationId: ctx.conversationId,
        role: "assistant",
        content: entry.content,
        usage: entry.usage,
        cost: entry.cost,
        metadata: entry.metadata
      });
    }
    await this.opts.credentials.touch(ctx.credentialId, (this.opts.now ?? (() => new Date()))());
    return message;
  }
}

/**
 * Accumulates stream fragments and records them once the stream ends.
 * A stream that ends without a single fragment and without completing
 * (the upstream failed or was cancelled before sending anything) is not
 * recorded.
 */
export class StreamRecording {
  private parts: string[] = [];
  private finished?: Promise<StoredMessage | undefined>;

  constructor(private readonly record: (content: string, outcome: StreamOutcome) => Promise<StoredMessage | undefined>) {}

  append(fragment: string): void {
    if (this.finished) return;
    this.parts.push(fragment);
  }

  get content(): string {
    return this.parts.join("");
  }

  get fragments(): number {
    return this.parts.length;
  }

  /** Idempotent: later calls return the first call's result. Rejects if persisting fails. */
  finish(outcome: StreamOutcome): Promise<StoredMessage | undefined> {
    if (!this.finished) {
      this.finished =
        this.parts.length === 0 && outcome !== "completed"
          ? Promise.resolve(undefined)
          : this.record(this.content, outcome);
    }
    return this.finished;
  }
}
