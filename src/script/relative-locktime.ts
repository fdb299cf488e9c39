// BIP-68 sequence flags
export const LOCK_TIME_DISABLE_FLAG_MASK = 0x80000000;
export const LOCK_TYPE_MASK = 0x00400000;

export const LOCK_TIME_INTERVAL_SECONDS = 512;

export enum LockTimeType {
    Height = 'Height',
    Time = 'Time'
}

/** `value` counts blocks for a height lock and 512-second intervals for a time lock. */
export type LockTime = { type: LockTimeType.Height; value: number } | { type: LockTimeType.Time; value: number };

/**
 * Interprets a number taken off the stack as a relative lock time. Returns undefined when it
 * is negative, wider than 32 bits, or has the disable flag set.
 */
export function fromNum(num: bigint | number): LockTime | undefined {
    if (typeof num == 'number' && !Number.isSafeInteger(num)) return undefined;
    const n = BigInt(num);
    if (n < 0n || n > 0xffffffffn) return undefined;

    const int = Number(n);
    if (int >= LOCK_TIME_DISABLE_FLAG_MASK) return undefined;

    const value = int & 0xffff;
    return int & LOCK_TYPE_MASK ? { type: LockTimeType.Time, value } : { type: LockTimeType.Height, value };
}

export function lockTimeToConsensus(lockTime: LockTime): number {
    return lockTime.type == LockTimeType.Time ? (lockTime.value | LOCK_TYPE_MASK) >>> 0 : lockTime.value;
}

export function lockTimeSeconds(lockTime: LockTime): number | undefined {
    return lockTime.type == LockTimeType.Time ? lockTime.value * LOCK_TIME_INTERVAL_SECONDS : undefined;
}

export function formatLockTime(lockTime: LockTime): string {
    const seconds = lockTimeSeconds(lockTime);
    return seconds === undefined ? `${lockTime.value} blocks` : `${seconds} seconds`;
}
