/**
 * Encounter Lock - serializes transcript handling per encounter.
 *
 * Recognizer callbacks arrive one at a time but asynchronously; two quick
 * transcripts ("yes", "yes") must never both read the same pending order.
 * Every read-modify-write of an encounter's queue or confirmation slot goes
 * through withEncounterLock.
 */

import { log, logError } from "./logger";

interface LockState {
  queue: Promise<void>;
  count: number;
}
const encounterLocks = new Map<string, LockState>();

const DEFAULT_LOCK_TIMEOUT_MS = 5000;
let lockTimeoutMs = DEFAULT_LOCK_TIMEOUT_MS;

export class LockTimeoutError extends Error {
  constructor(readonly encounterId: string, readonly operation: string) {
    super(`Encounter lock timeout for ${encounterId} operation ${operation}`);
    this.name = "LockTimeoutError";
  }
}

export function setLockTimeout(ms: number): void {
  lockTimeoutMs = ms;
}

/**
 * Run `fn` with exclusive access to an encounter's state.
 *
 * @throws LockTimeoutError when earlier holders do not release in time;
 * errors thrown by `fn` propagate unchanged.
 *
 * @example
 * ```typescript
 * await withEncounterLock(encounterId, "confirm", async () => {
 *   const held = session.confirmation.confirm();
 *   if (held) await session.queue.add(held);
 * });
 * ```
 */
export async function withEncounterLock<T>(
  encounterId: string,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const lockStart = Date.now();
  let lockAcquired = false;

  const lockState = encounterLocks.get(encounterId) ?? { queue: Promise.resolve(), count: 0 };
  const existingQueue = lockState.queue;

  lockState.count++;
  encounterLocks.set(encounterId, lockState);

  let release: () => void = () => {};
  const ourLock = new Promise<void>((resolve) => {
    release = resolve;
  });

  lockState.queue = existingQueue.then(() => ourLock);

  let timer: NodeJS.Timeout | undefined;
  try {
    await Promise.race([
      existingQueue,
      new Promise<void>((_, reject) => {
        timer = setTimeout(() => reject(new LockTimeoutError(encounterId, operation)), lockTimeoutMs);
      }),
    ]);

    lockAcquired = true;
    clearTimeout(timer);
    const waitTime = Date.now() - lockStart;
    if (waitTime > 100) {
      log(`[encounterLock] ${operation} waited ${waitTime}ms for lock on ${encounterId}`);
    }

    return await fn();
  } catch (err) {
    if (!lockAcquired) {
      logError(`[encounterLock] Lock timeout for ${encounterId}:`, operation);
    }
    throw err;
  } finally {
    if (timer) clearTimeout(timer);
    release();

    const current = encounterLocks.get(encounterId);
    if (current) {
      current.count--;
      if (current.count <= 0) {
        encounterLocks.delete(encounterId);
      }
    }
  }
}

export function hasActiveLock(encounterId: string): boolean {
  return encounterLocks.has(encounterId);
}

/** Only for tests and shutdown. */
export function clearAllLocks(): void {
  encounterLocks.clear();
}
