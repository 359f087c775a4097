/**
 * Relays a daemon response to the inbound client.
 */

import { pipeline } from 'node:stream/promises';
import type { Request, Response } from 'express';
import { describeRequest, type RequestDescriptor } from '../docker/request';
import { UpstreamError } from '../errors';
import { createTimer, type Logger } from '../lib/logger';
import type { DaemonResponse, ResponseHeaders, Transport } from './transport';

/** Connection-scoped headers that must not be copied from one hop to the next */
export const HOP_BY_HOP_HEADERS: ReadonlySet<string> = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
]);

export function stripHopByHop(headers: ResponseHeaders): ResponseHeaders {
  const listed = new Set(
    String(headers.connection ?? '')
      .split(',')
      .map((name) => name.trim().toLowerCase())
      .filter(Boolean),
  );
  const result: ResponseHeaders = {};
  for (const [name, value] of Object.entries(headers)) {
    const key = name.toLowerCase();
    if (!HOP_BY_HOP_HEADERS.has(key) && !listed.has(key)) {
      result[name] = value;
    }
  }
  return result;
}

export interface ForwardContext {
  tenantId: string;
  logger: Logger;
}

export class Forwarder {
  constructor(private readonly transport: Transport) {}

  /**
   * Send `descriptor` and stream the daemon's answer back unchanged.
   *
   * @throws TransportError when the daemon could not be reached; nothing has been written to `res` then
   */
  async forward(
    descriptor: RequestDescriptor,
    req: Request,
    res: Response,
    context: ForwardContext,
  ): Promise<void> {
    const { logger, tenantId } = context;
    const timer = createTimer(logger, 'forward', { method: descriptor.method, url: descriptor.url });
    logger.debug({ request: describeRequest(descriptor) }, 'Forwarding to daemon');

    const disconnect = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        disconnect.abort();
      }
    });

    let response: DaemonResponse;
    try {
      response = await this.transport.send(descriptor, {
        signal: disconnect.signal,
        context: { path: req.originalUrl, tenant: tenantId },
      });
    } catch (error) {
      timer.error(error);
      throw error;
    }

    if (response.status < 200 || response.status >= 300) {
      const upstream = new UpstreamError(response.status, descriptor.url, { tenant: tenantId });
      logger.warn({ err: upstream }, upstream.message);
    }

    res.status(response.status);
    for (const [name, value] of Object.entries(stripHopByHop(response.headers))) {
      res.setHeader(name, value);
    }
    res.flushHeaders();

    try {
      await pipeline(response.body, res);
      timer.end({ status: response.status });
    } catch (error) {
      // Headers are already sent; the connection is torn down by pipeline.
      logger.info({ err: error, aborted: disconnect.signal.aborted }, 'Response stream ended early');
    }
  }
}
