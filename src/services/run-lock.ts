/**
 * Scoring Run Lock
 *
 * In-process mutual exclusion for scoring runs: only one run executes at a
 * time, and the agent weights cannot change while one holds the lock.
 *
 * The lock has no TTL. A run always settles (stage failures are recovered,
 * agents have no timeouts to expire), and the lock is released in a
 * `finally` once it does.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LockInfo {
  lockId: string;
  acquiredAt: string;
  holderInfo: string;
}

export interface LockAcquisitionResult {
  acquired: boolean;
  lockId: string | null;
  /** If not acquired, info about who holds the lock */
  existingLock: LockInfo | null;
}

// ---------------------------------------------------------------------------
// In-Memory Lock State
// ---------------------------------------------------------------------------

let currentLock: {
  lockId: string;
  acquiredAt: number;
  holderInfo: string;
} | null = null;

function generateLockId(): string {
  return `lock_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;
}

function describe(lock: NonNullable<typeof currentLock>): LockInfo {
  return {
    lockId: lock.lockId,
    acquiredAt: new Date(lock.acquiredAt).toISOString(),
    holderInfo: lock.holderInfo,
  };
}

// ---------------------------------------------------------------------------
// Core Lock Operations
// ---------------------------------------------------------------------------

export function acquireLock(holderInfo: string): LockAcquisitionResult {
  if (currentLock) {
    console.log(
      `[RunLock] Lock already held by "${currentLock.holderInfo}" (acquired ${new Date(currentLock.acquiredAt).toISOString()})`,
    );
    return { acquired: false, lockId: null, existingLock: describe(currentLock) };
  }

  const lockId = generateLockId();
  currentLock = { lockId, acquiredAt: Date.now(), holderInfo };
  console.log(`[RunLock] Lock acquired: ${lockId} by "${holderInfo}"`);
  return { acquired: true, lockId, existingLock: null };
}

/**
 * Release the lock. Only the holder (matching lockId) can release it.
 */
export function releaseLock(lockId: string): boolean {
  if (!currentLock || currentLock.lockId !== lockId) {
    console.warn(
      `[RunLock] Cannot release: lock ${lockId} not found or doesn't match current lock`,
    );
    return false;
  }

  const holderInfo = currentLock.holderInfo;
  currentLock = null;
  console.log(`[RunLock] Lock released: ${lockId} (was held by "${holderInfo}")`);
  return true;
}

export function getLockStatus(): { isLocked: boolean; lock: LockInfo | null } {
  if (!currentLock) return { isLocked: false, lock: null };
  return { isLocked: true, lock: describe(currentLock) };
}

// ---------------------------------------------------------------------------
// Higher-Level Helpers
// ---------------------------------------------------------------------------

/**
 * Execute a function while holding the run lock, releasing it afterwards
 * even if the function throws.
 *
 * Returns null if the lock could not be acquired.
 */
export async function withRunLock<T>(
  holderInfo: string,
  fn: () => Promise<T>,
): Promise<{ result: T; lockId: string } | null> {
  const acquisition = acquireLock(holderInfo);
  if (!acquisition.acquired || !acquisition.lockId) {
    return null;
  }

  const lockId = acquisition.lockId;
  try {
    const result = await fn();
    return { result, lockId };
  } finally {
    releaseLock(lockId);
  }
}
