/**
 * In-process stand-in for the ioredis client, covering the commands the
 * registry's Redis store issues. Installed with vi.mock('ioredis').
 *
 * Clients created with the same URL share one dataset, the way two
 * connections share one server; WATCH state belongs to each client.
 */

type ExecResult = Array<[Error | null, unknown]>;

interface FakeServer {
  strings: Map<string, string>;
  lists: Map<string, string[]>;
  hashes: Map<string, Map<string, string>>;
  /** Bumped on every write to a key; WATCH compares against it */
  versions: Map<string, number>;
}

const servers = new Map<string, FakeServer>();

function serverFor(url: string): FakeServer {
  let server = servers.get(url);
  if (!server) {
    server = { strings: new Map(), lists: new Map(), hashes: new Map(), versions: new Map() };
    servers.set(url, server);
  }
  return server;
}

export const fakeRedisControl: {
  /** 'conflict' makes the next exec() behave like a failed WATCH; 'error' fails its first command */
  nextExec: 'conflict' | 'error' | null;
  reset: () => void;
} = {
  nextExec: null,
  reset() {
    this.nextExec = null;
    servers.clear();
  },
};

export class FakeRedis {
  status = 'ready';
  private server: FakeServer;
  private watched = new Map<string, number>();

  constructor(url: unknown = 'redis://localhost:6379', ..._options: unknown[]) {
    this.server = serverFor(String(url));
  }

  on(_event: string, _listener: (...args: unknown[]) => void): this {
    return this;
  }

  async quit(): Promise<'OK'> {
    return 'OK';
  }

  async watch(...keys: string[]): Promise<'OK'> {
    for (const key of keys) {
      if (!this.watched.has(key)) this.watched.set(key, this.version(key));
    }
    return 'OK';
  }

  async unwatch(): Promise<'OK'> {
    this.watched.clear();
    return 'OK';
  }

  async get(key: string): Promise<string | null> {
    return this.server.strings.get(key) ?? null;
  }

  /** Supports the `EX <seconds>` and `NX` flags; expiry itself is not simulated. */
  async set(key: string, value: string, ...flags: Array<string | number>): Promise<'OK' | null> {
    if (flags.includes('NX') && this.server.strings.has(key)) return null;
    this.server.strings.set(key, value);
    this.touch(key);
    return 'OK';
  }

  async incrby(key: string, amount: number): Promise<number> {
    const next = parseInt(this.server.strings.get(key) ?? '0', 10) + amount;
    this.server.strings.set(key, String(next));
    this.touch(key);
    return next;
  }

  async hget(key: string, field: string): Promise<string | null> {
    return this.server.hashes.get(key)?.get(field) ?? null;
  }

  async hset(key: string, field: string, value: string): Promise<number> {
    const hash = this.server.hashes.get(key) ?? new Map<string, string>();
    const added = hash.has(field) ? 0 : 1;
    hash.set(field, value);
    this.server.hashes.set(key, hash);
    this.touch(key);
    return added;
  }

  async rpush(key: string, ...values: string[]): Promise<number> {
    const list = this.server.lists.get(key) ?? [];
    list.push(...values);
    this.server.lists.set(key, list);
    this.touch(key);
    return list.length;
  }

  async lset(key: string, index: number, value: string): Promise<'OK'> {
    const list = this.server.lists.get(key);
    if (!list || index < 0 || index >= list.length) {
      throw new Error('ERR index out of range');
    }
    list[index] = value;
    this.touch(key);
    return 'OK';
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    const list = this.server.lists.get(key) ?? [];
    const end = stop < 0 ? list.length + stop + 1 : stop + 1;
    return list.slice(start, end);
  }

  async lindex(key: string, index: number): Promise<string | null> {
    if (!Number.isSafeInteger(index)) {
      throw new Error('ERR value is not an integer or out of range');
    }
    return this.server.lists.get(key)?.[index] ?? null;
  }

  async llen(key: string): Promise<number> {
    return this.server.lists.get(key)?.length ?? 0;
  }

  multi(): FakeMulti {
    return new FakeMulti(this);
  }

  /** True when a watched key was written since WATCH; clears the watch like EXEC does. */
  takeWatchConflict(): boolean {
    const conflict = [...this.watched].some(([key, version]) => this.version(key) !== version);
    this.watched.clear();
    return conflict;
  }

  private version(key: string): number {
    return this.server.versions.get(key) ?? 0;
  }

  private touch(key: string): void {
    this.server.versions.set(key, this.version(key) + 1);
  }
}

class FakeMulti {
  private commands: Array<() => Promise<unknown>> = [];

  constructor(private redis: FakeRedis) {}

  set(key: string, value: string): this {
    this.commands.push(() => this.redis.set(key, value));
    return this;
  }

  incrby(key: string, amount: number): this {
    this.commands.push(() => this.redis.incrby(key, amount));
    return this;
  }

  hset(key: string, field: string, value: string): this {
    this.commands.push(() => this.redis.hset(key, field, value));
    return this;
  }

  rpush(key: string, ...values: string[]): this {
    this.commands.push(() => this.redis.rpush(key, ...values));
    return this;
  }

  lset(key: string, index: number, value: string): this {
    this.commands.push(() => this.redis.lset(key, index, value));
    return this;
  }

  async exec(): Promise<ExecResult | null> {
    const mode = fakeRedisControl.nextExec;
    fakeRedisControl.nextExec = null;

    const conflict = this.redis.takeWatchConflict();
    if (conflict || mode === 'conflict') return null;
    if (mode === 'error') {
      return this.commands.map((_command, position) => [
        position === 0 ? new Error('ERR simulated failure') : null,
        null,
      ]);
    }

    const results: ExecResult = [];
    for (const command of this.commands) {
      try {
        results.push([null, await command()]);
      } catch (error) {
        results.push([error instanceof Error ? error : new Error(String(error)), null]);
      }
    }
    return results;
  }
}
