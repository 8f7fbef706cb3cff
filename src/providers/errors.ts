/**
 * Provider error taxonomy.
 *
 * Every failure a client can raise is one of four kinds. The client only
 * classifies; retry decisions belong to the caller.
 */
export type ProviderErrorKind =
  | "configuration"
  | "transport"
  | "http_status"
  | "protocol_decode";

const FRAGMENT_LIMIT = 500;

export abstract class ProviderError extends Error {
  abstract readonly kind: ProviderErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid credentials/settings. Raised at construction. */
export class ConfigurationError extends ProviderError {
  readonly kind = "configuration" as const;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.issues = issues;
  }
}

/** Connection refused, DNS, proxy failure, timeout or abort. */
export class TransportError extends ProviderError {
  readonly kind = "transport" as const;
  readonly url: string;

  constructor(url: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Request to ${url} failed: ${detail}`, { cause });
    this.url = url;
  }
}

/** The endpoint answered with a non-success status. `body` is verbatim. */
export class HttpStatusError extends ProviderError {
  readonly kind = "http_status" as const;
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`Provider returned HTTP ${status}: ${truncate(body)}`);
    this.status = status;
    this.body = body;
  }
}

/** A success response that does not match the expected envelope. */
export class ProtocolDecodeError extends ProviderError {
  readonly kind = "protocol_decode" as const;
  readonly fragment: string;

  constructor(reason: string, raw: string) {
    super(`Unexpected response envelope: ${reason}`);
    this.fragment = truncate(raw);
  }
}

export type AnyProviderError =
  | ConfigurationError
  | TransportError
  | HttpStatusError
  | ProtocolDecodeError;

export function isProviderError(value: unknown): value is AnyProviderError {
  return value instanceof ProviderError;
}

function truncate(text: string): string {
  return text.length > FRAGMENT_LIMIT ? text.slice(0, FRAGMENT_LIMIT) : text;
}
