import type { Readable } from "node:stream";
import { Agent, type Dispatcher, errors as undiciErrors } from "undici";
import { ClientClosedError, classifyUpstreamError, formatTarget } from "./errors.js";
import type { UpstreamConfig, UpstreamTarget } from "./types.js";

/** Methods relayed upstream. Anything else is answered locally with 501. */
export const FORWARDABLE_METHODS = ["GET", "HEAD", "POST", "PUT", "DELETE", "OPTIONS", "PATCH"] as const;
export type ForwardableMethod = (typeof FORWARDABLE_METHODS)[number];

export function isForwardableMethod(method: string): method is ForwardableMethod {
  return FORWARDABLE_METHODS.some((m) => m === method);
}

export interface UpstreamRequest {
  target: UpstreamTarget;
  method: ForwardableMethod;
  /** Raw request target (path + query), sent verbatim. */
  path: string;
  headers: Record<string, string>;
  body?: Buffer;
  /** Aborts the upstream call when the client goes away. */
  signal?: AbortSignal;
}

export interface UpstreamResponse {
  status: number;
  headers: Record<string, string | string[] | undefined>;
  body: Readable;
}

export function originOf(target: UpstreamTarget): string {
  return `http://${formatTarget(target)}`;
}

type Handlers = Dispatcher.DispatchHandlers;

/**
 * Runs the read timeout on a plain `setTimeout`, armed when undici hands the
 * request to a connected socket and cleared when response headers arrive.
 * Expiry fails the request with undici's own headers-timeout error.
 */
class ReadTimeoutHandler implements Handlers {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly handler: Handlers,
    private readonly timeoutMs: number,
  ) {}

  onConnect(abort: (err?: Error) => void): void {
    // Armed first: the wrapped handler may abort synchronously, which clears it.
    this.timer = setTimeout(
      () => abort(new undiciErrors.HeadersTimeoutError(`No response headers within ${this.timeoutMs}ms`)),
      this.timeoutMs,
    );
    this.handler.onConnect?.(abort);
  }

  onError(err: Error): void {
    this.clear();
    this.handler.onError?.(err);
  }

  onHeaders(...args: Parameters<NonNullable<Handlers["onHeaders"]>>): boolean {
    this.clear();
    return this.handler.onHeaders?.(...args) ?? true;
  }

  onData(chunk: Buffer): boolean {
    return this.handler.onData?.(chunk) ?? true;
  }

  onComplete(trailers: string[] | null): void {
    this.clear();
    this.handler.onComplete?.(trailers);
  }

  onBodySent(chunkSize: number, totalBytesSent: number): void {
    this.handler.onBodySent?.(chunkSize, totalBytesSent);
  }

  private clear(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }
}

/**
 * HTTP/1.1 client for upstream targets over a bounded keep-alive pool.
 *
 * Each origin gets at most `poolSize` sockets; further requests queue inside
 * the pool until a socket frees up. A socket goes back to the pool once the
 * response body is consumed or destroyed, so every caller must do one or the other.
 *
 * The read timeout starts once the request is on a connected socket, so time
 * spent queued for a pool slot or connecting is not charged to it, and a 504
 * is never reported before the bound. Connecting has its own bound. Stalls
 * between body chunks are bounded by the read timeout through the body timeout.
 */
export class UpstreamClient {
  private readonly dispatcher: Dispatcher;

  constructor(private readonly config: UpstreamConfig) {
    const agent = new Agent({
      connections: config.poolSize,
      keepAliveTimeout: config.keepAliveTimeoutMs,
      headersTimeout: 0,
      bodyTimeout: config.readTimeoutMs,
      connect: { timeout: config.connectTimeoutMs },
    });
    this.dispatcher = agent.compose(
      (dispatch) => (opts, handler) => dispatch(opts, new ReadTimeoutHandler(handler, config.readTimeoutMs)),
    );
  }

  async send(req: UpstreamRequest): Promise<UpstreamResponse> {
    if (req.signal?.aborted) throw new ClientClosedError();

    const controller = new AbortController();
    const onClientAbort = () => controller.abort(new ClientClosedError());
    const detach = () => req.signal?.removeEventListener("abort", onClientAbort);
    req.signal?.addEventListener("abort", onClientAbort, { once: true });

    try {
      const res = await this.dispatcher.request({
        origin: originOf(req.target),
        path: req.path,
        method: req.method,
        headers: req.headers,
        body: req.body,
        signal: controller.signal,
      });
      // Client disconnects during the body relay still tear the response down.
      res.body.once("close", detach);
      return { status: res.statusCode, headers: res.headers, body: res.body };
    } catch (err) {
      detach();
      const cause: unknown = controller.signal.aborted ? controller.signal.reason : err;
      throw classifyUpstreamError(cause, req.target, this.config.readTimeoutMs) ?? err;
    }
  }

  /** Let in-flight requests finish, then close pooled sockets. */
  close(): Promise<void> {
    return this.dispatcher.close();
  }
}
