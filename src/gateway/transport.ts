/**
 * Outbound HTTP transport to Docker daemons, built on undici.
 *
 * One `Agent` is shared by every TCP daemon and one is kept per unix socket.
 * A request is attempted exactly once.
 */

import type { Readable } from 'node:stream';
import { Agent, request } from 'undici';
import type { RequestDescriptor } from '../docker/request';
import { TransportError } from '../errors';
import type { Logger } from '../lib/logger';

export type ResponseHeaders = Record<string, string | string[]>;

export interface DaemonResponse {
  status: number;
  headers: ResponseHeaders;
  body: Readable;
}

export interface SendOptions {
  /** Aborts the request, e.g. when the inbound client goes away */
  signal?: AbortSignal;
  /** Merged into the context of a `TransportError` */
  context?: Record<string, unknown>;
}

export interface Transport {
  /**
   * Send `descriptor` and resolve once response headers have arrived.
   *
   * @throws TransportError when no response is received
   */
  send(descriptor: RequestDescriptor, options?: SendOptions): Promise<DaemonResponse>;
  close(): Promise<void>;
}

export interface UndiciTransportOptions {
  /** Time allowed until response headers arrive, in milliseconds. 0 disables it */
  timeoutMs: number;
  logger: Logger;
}

/** Docker's `tcp://` addresses speak plain HTTP */
export function dialUrl(url: string): string {
  return url.startsWith('tcp://') ? `http://${url.slice('tcp://'.length)}` : url;
}

function normalizeHeaders(headers: Record<string, string | string[] | undefined>): ResponseHeaders {
  const result: ResponseHeaders = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value !== undefined) {
      result[name] = value;
    }
  }
  return result;
}

export class UndiciTransport implements Transport {
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private tcpAgent?: Agent;
  private readonly socketAgents = new Map<string, Agent>();

  constructor(options: UndiciTransportOptions) {
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger.child({ component: 'UndiciTransport' });
  }

  private dispatcherFor(descriptor: RequestDescriptor): Agent {
    // Streaming endpoints (logs, events, attach) stay open indefinitely.
    const agentOptions = { bodyTimeout: 0, headersTimeout: 0 };

    if (descriptor.endpoint.kind === 'unix') {
      const { socketPath } = descriptor.endpoint;
      let agent = this.socketAgents.get(socketPath);
      if (!agent) {
        agent = new Agent({ ...agentOptions, connect: { socketPath } });
        this.socketAgents.set(socketPath, agent);
      }
      return agent;
    }

    this.tcpAgent ??= new Agent(agentOptions);
    return this.tcpAgent;
  }

  async send(descriptor: RequestDescriptor, options: SendOptions = {}): Promise<DaemonResponse> {
    const url = dialUrl(descriptor.url);
    const timeout = new AbortController();
    const timer =
      this.timeoutMs > 0
        ? setTimeout(() => timeout.abort(new Error('Timed out waiting for daemon')), this.timeoutMs)
        : undefined;
    const signal = options.signal ? AbortSignal.any([options.signal, timeout.signal]) : timeout.signal;

    try {
      const response = await request(url, {
        method: descriptor.method,
        headers: descriptor.headers,
        body: descriptor.body?.content,
        signal,
        dispatcher: this.dispatcherFor(descriptor),
      });

      return {
        status: response.statusCode,
        headers: normalizeHeaders(response.headers),
        body: response.body,
      };
    } catch (error) {
      const timedOut = timeout.signal.aborted;
      const cause = error instanceof Error ? error : new Error(String(error));
      const message = timedOut
        ? `Daemon did not respond within ${this.timeoutMs}ms`
        : options.signal?.aborted
          ? 'Request aborted by client'
          : `Daemon request failed: ${cause.message}`;

      this.logger.debug({ err: cause, url: descriptor.url, timedOut }, 'Daemon request failed');
      throw new TransportError(message, descriptor.url, cause, timedOut, options.context);
    } finally {
      clearTimeout(timer);
    }
  }

  async close(): Promise<void> {
    const agents = [...this.socketAgents.values()];
    if (this.tcpAgent) agents.push(this.tcpAgent);
    this.socketAgents.clear();
    this.tcpAgent = undefined;
    await Promise.all(agents.map((agent) => agent.close()));
  }
}
