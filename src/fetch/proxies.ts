/**
 * Proxy list loading and round-robin rotation with sticky failure
 */

import { readFile } from 'node:fs/promises';
import type { ProxyEndpoint } from '../types.js';
import { logger } from '../util/logger.js';

/**
 * Build a dialable proxy URL, defaulting to http:// when no scheme is given
 */
export function toProxyUrl(entry: string): string {
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(entry) ? entry : `http://${entry}`;
}

const SUPPORTED_PROXY_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Whether the transport can dial the entry: http(s) only, no socks
 */
export function isSupportedProxy(entry: string): boolean {
  try {
    return SUPPORTED_PROXY_PROTOCOLS.has(new URL(toProxyUrl(entry)).protocol);
  } catch {
    return false;
  }
}

/**
 * Parse a proxy list: one per line, blank lines and # comments ignored,
 * entries the transport cannot dial dropped with a warning
 */
export function parseProxyList(text: string): string[] {
  const entries = text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));

  const unsupported = entries.filter(entry => !isSupportedProxy(entry));
  if (unsupported.length > 0) {
    logger.warn(`Skipping ${unsupported.length} proxies without an http or https URL`, {
      sample: unsupported.slice(0, 3).map(entry => entry.slice(0, 30)),
    });
  }
  return entries.filter(isSupportedProxy);
}

export async function loadProxyFile(path: string): Promise<string[]> {
  try {
    const proxies = parseProxyList(await readFile(path, 'utf-8'));
    logger.info(`Loaded ${proxies.length} proxies`, { path });
    return proxies;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.info('No proxy file found, running without proxies', { path });
      return [];
    }
    throw error;
  }
}

/**
 * Round-robin selector over proxy endpoints. The only writer of endpoint state.
 */
export class ProxyRotator {
  private readonly endpoints: ProxyEndpoint[];
  private cursor = 0;

  constructor(entries: readonly string[] = []) {
    const unique = [...new Set(entries)];
    this.endpoints = unique.map(id => ({ id, url: toProxyUrl(id), failed: false }));
  }

  /**
   * Next usable endpoint, or null when none is configured or all have failed
   */
  next(): Readonly<ProxyEndpoint> | null {
    const total = this.endpoints.length;
    for (let inspected = 0; inspected < total; inspected++) {
      const endpoint = this.endpoints[this.cursor % total];
      this.cursor = (this.cursor + 1) % total;
      if (endpoint && !endpoint.failed) {
        return Object.freeze({ ...endpoint });
      }
    }
    return null;
  }

  markFailed(id: string): void {
    const endpoint = this.endpoints.find(e => e.id === id);
    if (!endpoint || endpoint.failed) {
      return;
    }
    endpoint.failed = true;
    logger.warn('Proxy marked as failed', {
      proxy: id.slice(0, 30),
      remaining: this.available(),
    });
  }

  available(): number {
    return this.endpoints.filter(e => !e.failed).length;
  }

  get size(): number {
    return this.endpoints.length;
  }

  snapshot(): ReadonlyArray<Readonly<ProxyEndpoint>> {
    return this.endpoints.map(e => ({ ...e }));
  }
}
