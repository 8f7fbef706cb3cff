import { Agent, ProxyAgent, request, type Dispatcher } from "undici";
import { TransportError } from "./errors.js";

export interface HttpRequest {
  url: string;
  headers: Record<string, string>;
  body: string;
  proxyUrl?: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface HttpResponse {
  readonly status: number;
  /** Body bytes, read lazily as they arrive. */
  readonly body: AsyncIterable<Uint8Array>;
  /** Read the rest of the body as text. */
  text(): Promise<string>;
  /** Release the connection. Safe to call more than once. */
  close(): Promise<void>;
}

/**
 * HttpTransport – the only seam between a client and the network.
 * Implementations must raise TransportError for anything that goes wrong
 * below the HTTP status line.
 */
export interface HttpTransport {
  post(request: HttpRequest): Promise<HttpResponse>;
}

export type DispatcherFactory = (request: HttpRequest) => Dispatcher;

/**
 * ProxyAgent ignores `connect`; its connect timeouts come from the TLS
 * option blocks, one for the proxy hop and one for the tunnelled origin.
 */
export function proxyAgentOptions(proxyUrl: string, timeoutMs: number): ProxyAgent.Options {
  return {
    uri: proxyUrl,
    proxyTls: { timeout: timeoutMs },
    requestTls: { timeout: timeoutMs },
  };
}

/**
 * One dispatcher per call, so a connection never outlives the request that
 * opened it. The proxy is only used for https endpoints.
 */
export function createCallDispatcher(req: HttpRequest): Dispatcher {
  if (req.proxyUrl && new URL(req.url).protocol === "https:") {
    return new ProxyAgent(proxyAgentOptions(req.proxyUrl, req.timeoutMs));
  }
  return new Agent({ connect: { timeout: req.timeoutMs } });
}

export class UndiciTransport implements HttpTransport {
  private readonly createDispatcher: DispatcherFactory;

  constructor(options?: { createDispatcher?: DispatcherFactory }) {
    this.createDispatcher = options?.createDispatcher ?? createCallDispatcher;
  }

  async post(req: HttpRequest): Promise<HttpResponse> {
    const dispatcher = this.createDispatcher(req);

    let data: Dispatcher.ResponseData;
    try {
      data = await request(req.url, {
        method: "POST",
        headers: req.headers,
        body: req.body,
        dispatcher,
        signal: req.signal,
        headersTimeout: req.timeoutMs,
        bodyTimeout: req.timeoutMs,
      });
    } catch (error) {
      await dispatcher.destroy();
      throw new TransportError(req.url, error);
    }

    return new UndiciResponse(req.url, data, dispatcher);
  }
}

class UndiciResponse implements HttpResponse {
  readonly status: number;
  private readonly url: string;
  private readonly data: Dispatcher.ResponseData;
  private readonly dispatcher: Dispatcher;
  private closed = false;

  constructor(url: string, data: Dispatcher.ResponseData, dispatcher: Dispatcher) {
    this.url = url;
    this.data = data;
    this.dispatcher = dispatcher;
    this.status = data.statusCode;
  }

  get body(): AsyncIterable<Uint8Array> {
    return this.read();
  }

  async text(): Promise<string> {
    try {
      return await this.data.body.text();
    } catch (error) {
      throw new TransportError(this.url, error);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.data.body.destroy();
    await this.dispatcher.destroy();
  }

  private async *read(): AsyncGenerator<Uint8Array> {
    try {
      for await (const chunk of this.data.body) {
        yield chunk;
      }
    } catch (error) {
      throw new TransportError(this.url, error);
    }
  }
}
