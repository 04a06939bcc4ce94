/**
 * HTTP transport over undici: one direct pool plus one ProxyAgent per proxy URL
 */

import { Agent, ProxyAgent, fetch, type Dispatcher } from 'undici';
import { LRUCache } from 'lru-cache';
import { FetchError, type HttpRequest, type HttpResponse, type HttpTransport, type SendOptions } from '../types.js';
import { logger, describeError } from '../util/logger.js';

export interface TransportOptions {
  /** Live proxy dispatchers kept; the least recently used is closed beyond it */
  maxProxyAgents: number;
  /** Connections per origin, for the direct pool and for each proxy */
  perHostConnections: number;
}

export class UndiciTransport implements HttpTransport {
  private readonly direct: Agent;
  private readonly proxied: LRUCache<string, ProxyAgent>;
  private readonly perHostConnections: number;

  constructor(options: TransportOptions) {
    this.perHostConnections = options.perHostConnections;
    this.direct = new Agent({ connections: options.perHostConnections });
    this.proxied = new LRUCache<string, ProxyAgent>({
      max: Math.max(1, options.maxProxyAgents),
      dispose: (agent, proxyUrl) => {
        agent.close().catch(error => {
          logger.debug('Failed to close proxy agent', { proxyUrl, error: describeError(error) });
        });
      },
    });
  }

  dispatcherFor(proxyUrl?: string): Dispatcher {
    if (!proxyUrl) {
      return this.direct;
    }
    let agent = this.proxied.get(proxyUrl);
    if (!agent) {
      agent = new ProxyAgent({ uri: proxyUrl, connections: this.perHostConnections });
      this.proxied.set(proxyUrl, agent);
    }
    return agent;
  }

  async send(request: HttpRequest, options: SendOptions): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
        dispatcher: this.dispatcherFor(options.proxyUrl),
      });
      const body = await response.text();
      return { status: response.status, body };

    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new FetchError(`Request timeout after ${options.timeoutMs}ms`);
      }
      throw new FetchError(`Network error: ${describeError(error)}`);

    } finally {
      clearTimeout(timeoutId);
    }
  }

  async close(): Promise<void> {
    this.proxied.clear();
    await this.direct.close();
  }
}

export function createTransport(options: TransportOptions): HttpTransport {
  return new UndiciTransport(options);
}
