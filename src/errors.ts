/**
 * Error taxonomy shared by adapters, the router and the HTTP boundary. Every
 * class carries the HTTP status it is rendered with and a stable machine code.
 */
export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code: string
  ) {
    super(message);
    this.name = "GatewayError";
  }
}

export class ConfigError extends GatewayError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 400, "config_error");
    this.name = "ConfigError";
  }
}

export class ValidationError extends GatewayError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 400, "invalid_request");
    this.name = "ValidationError";
  }
}

export class AuthError extends GatewayError {
  constructor(message: string, public readonly provider?: string, status: 401 | 403 = 401) {
    super(message, status, status === 403 ? "permission_denied" : "invalid_api_key");
    this.name = "AuthError";
  }
}

export class NotFoundError extends GatewayError {
  constructor(message: string) {
    super(message, 404, "not_found");
    this.name = "NotFoundError";
  }
}

export class UnsupportedProviderError extends GatewayError {
  constructor(public readonly provider: string) {
    super(`Unsupported provider: ${provider}`, 400, "unsupported_provider");
    this.name = "UnsupportedProviderError";
  }
}

export type NoCapacityReason = "unconfigured" | "rate_limited";

export class NoCapacityError extends GatewayError {
  constructor(public readonly provider: string, public readonly reason: NoCapacityReason) {
    super(
      reason === "rate_limited"
        ? `All credentials for provider '${provider}' are rate limited`
        : `No available upstream capacity for provider '${provider}'`,
      429,
      reason === "rate_limited" ? "rate_limited" : "no_upstream_credential"
    );
    this.name = "NoCapacityError";
  }
}

export class UpstreamError extends GatewayError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly upstreamStatus?: number,
    public readonly providerMessage?: string,
    public readonly requestId?: string,
    public readonly retryable: boolean = true,
    public readonly retryAfter?: number
  ) {
    super(message, 502, "upstream_error");
    this.name = "UpstreamError";
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === "string" ? error : "Unknown error";
}
