import dns from 'node:dns';

import { getErrorMessage } from './errors.js';
import { logDebug } from './observability.js';

export type HostnameResolver = (ip: string) => Promise<string>;

export const reverseLookup: HostnameResolver = async (ip) => {
  const [hostname] = await dns.promises.reverse(ip);
  return hostname ?? ip;
};

const DEFAULT_MAX_ENTRIES = 10_000;

/**
 * Client address to hostname, kept for the life of the process. The
 * resolver runs outside the map update, so two requests from a new address
 * may both resolve it; the later write wins, which is harmless because the
 * entries are equal. Failed lookups are not cached.
 */
export class HostnameCache {
  private readonly entries = new Map<string, string>();

  constructor(
    private readonly resolver: HostnameResolver = reverseLookup,
    private readonly maxEntries = DEFAULT_MAX_ENTRIES
  ) {}

  get size(): number {
    return this.entries.size;
  }

  peek(ip: string): string | undefined {
    return this.entries.get(ip);
  }

  async lookup(ip: string): Promise<string | undefined> {
    const cached = this.entries.get(ip);
    if (cached !== undefined) return cached;

    let hostname: string;
    try {
      hostname = await this.resolver(ip);
    } catch (error) {
      logDebug('Reverse address lookup failed', {
        ip,
        error: getErrorMessage(error),
      });
      return undefined;
    }

    this.store(ip, hostname);
    return hostname;
  }

  private store(ip: string, hostname: string): void {
    if (!this.entries.has(ip) && this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(ip, hostname);
  }
}
