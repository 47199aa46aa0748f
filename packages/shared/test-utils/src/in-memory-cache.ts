/**
 * Map-backed stand-in for the platform Redis cache. TTLs are recorded but
 * never expire entries.
 */
export class InMemoryCache {
  readonly entries = new Map<string, string>();
  readonly ttls = new Map<string, number>();
  ready = true;

  async get(key: string): Promise<string | null> {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<boolean> {
    this.entries.set(key, value);
    if (ttlSeconds !== undefined) this.ttls.set(key, ttlSeconds);
    return true;
  }

  async del(key: string): Promise<boolean> {
    this.ttls.delete(key);
    return this.entries.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.entries.has(key);
  }

  async keys(pattern: string): Promise<string[]> {
    const matcher = new RegExp(`^${pattern.split('*').map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&')).join('.*')}$`);
    return [...this.entries.keys()].filter(key => matcher.test(key));
  }

  async ping(): Promise<boolean> {
    return this.ready;
  }

  isReady(): boolean {
    return this.ready;
  }

  async disconnect(): Promise<void> {
    this.ready = false;
  }
}
