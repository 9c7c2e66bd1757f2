import { RegistryError } from '../../src/registry/errors.js';
import { Registry } from '../../src/registry/registry.js';
import { MemoryRegistryStore } from '../../src/store/memoryStore.js';
import type { RegistryStore } from '../../src/store/types.js';

// Digit-only addresses are already in checksum form.
export const OWNER = '0x1000000000000000000000000000000000000001';
export const ALICE = '0x2000000000000000000000000000000000000002';
export const BOB = '0x3000000000000000000000000000000000000003';
export const ISSUER = '0x4000000000000000000000000000000000000004';
export const STRANGER = '0x5000000000000000000000000000000000000005';

export const T0 = 1_700_000_000;

export interface TestClock {
  now: number;
  read: () => number;
  advance: (seconds: number) => void;
}

export function makeClock(start = T0): TestClock {
  const clock: TestClock = {
    now: start,
    read: () => clock.now,
    advance: (seconds: number) => {
      clock.now += seconds;
    },
  };
  return clock;
}

export const ALICE_PROFILE = {
  name: 'Alice',
  email: 'alice@example.com',
  profileHash: 'bafy-alice-profile',
};

export const BOB_PROFILE = {
  name: 'Bob',
  email: 'bob@example.com',
  profileHash: '',
};

export async function makeRegistry(options: { store?: RegistryStore; clock?: TestClock; owner?: string } = {}) {
  const store = options.store ?? new MemoryRegistryStore();
  const clock = options.clock ?? makeClock();
  const registry = new Registry({ store, owner: options.owner ?? OWNER, clock: clock.read });
  await registry.init();
  return { registry, store, clock };
}

/** Await a promise that must reject with a RegistryError and return it. */
export async function rejectionOf(promise: Promise<unknown>): Promise<RegistryError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RegistryError) return error;
    throw error;
  }
  throw new Error('Expected the operation to be rejected');
}
