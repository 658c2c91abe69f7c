import type { LockRegistry, RegenerationLock } from './types';

/**
 * Per-key regeneration locks. Acquisition never waits: a caller that loses the
 * race gets null and is expected to skip or join the running generation.
 */
export function createLockRegistry(): LockRegistry {
  const held = new Map<string, RegenerationLock>();

  function tryAcquire(key: string): RegenerationLock | null {
    if (held.has(key)) return null;

    let released = false;
    const lock: RegenerationLock = {
      key,
      acquiredAt: Date.now(),
      get released() {
        return released;
      },
      release() {
        if (released) return;
        released = true;
        // Only clear the slot if it still belongs to this lock
        if (held.get(key) === lock) {
          held.delete(key);
        }
      },
    };

    held.set(key, lock);
    return lock;
  }

  return {
    tryAcquire,
    isHeld: (key) => held.has(key),
    heldKeys: () => Array.from(held.keys()),
  };
}
