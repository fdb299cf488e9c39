import { ExecError, ExecErrorCode } from './exec-error';

export const DEFAULT_MAX_SCRIPTINT_SIZE = 4;
export const MAX_SCRIPTINT_SIZE = 8;

// 8 bytes hold every i64 except i64::MIN, which needs eight magnitude bytes plus a sign byte
export const SCRIPTINT_SCRATCH_SIZE = 8;
const SCRIPTINT_MAX_ENCODED_SIZE = 9;

const I64_MIN = -(1n << 63n);
const I64_MAX = (1n << 63n) - 1n;

export enum ScriptIntErrorKind {
    NonMinimalPush = 'NonMinimalPush',
    NumericOverflow = 'NumericOverflow'
}

const messages: { [kind in ScriptIntErrorKind]: string } = {
    [ScriptIntErrorKind.NonMinimalPush]: 'non-minimal datapush',
    [ScriptIntErrorKind.NumericOverflow]: 'numeric overflow (number on stack larger than 4 bytes)'
};

export class ScriptIntError extends Error {
    readonly kind: ScriptIntErrorKind;

    constructor(kind: ScriptIntErrorKind) {
        super(messages[kind]);
        this.name = 'ScriptIntError';
        this.kind = kind;
    }
}

export function isI64(n: bigint): boolean {
    return n >= I64_MIN && n <= I64_MAX;
}

/**
 * Encodes an integer in minimal CScriptNum form into `out`, returning the number of bytes
 * written.
 *
 * Values needing more than 4 bytes are written the way Bitcoin Core serializes them, even
 * though `readScriptint` with the default size cap will not read them back.
 */
export function writeScriptint(out: Uint8Array, n: bigint): number {
    if (!isI64(n)) throw new RangeError(`Integer out of 64-bit range: ${n}`);

    let len = 0;
    const put = (b: number) => {
        if (len >= out.length) throw new RangeError(`Scratch buffer too small for ${n}`);
        out[len++] = b;
    };
    if (n == 0n) return len;

    const neg = n < 0n;
    let abs = neg ? -n : n;
    while (abs > 0xffn) {
        put(Number(abs & 0xffn));
        abs >>= 8n;
    }
    // the value's own top bit would read as the sign, so the sign gets a byte of its own
    if (abs & 0x80n) {
        put(Number(abs));
        put(neg ? 0x80 : 0x00);
    } else {
        put(Number(abs) | (neg ? 0x80 : 0x00));
    }
    return len;
}

export function scriptintVec(n: bigint): Buffer {
    const scratch = new Uint8Array(SCRIPTINT_MAX_ENCODED_SIZE);
    const len = writeScriptint(scratch, n);
    return Buffer.from(scratch.subarray(0, len));
}

/**
 * Decodes a script integer with an arbitrary size cap (at most 8 bytes).
 * Most callers want {@link readScriptint}.
 */
export function readScriptintSize(bytes: Uint8Array, maxSize: number, minimal: boolean): bigint {
    if (!Number.isInteger(maxSize) || maxSize < 0 || maxSize > MAX_SCRIPTINT_SIZE)
        throw new RangeError(`Invalid scriptint size limit: ${maxSize}`);

    if (bytes.length > maxSize) throw new ScriptIntError(ScriptIntErrorKind.NumericOverflow);
    if (bytes.length == 0) return 0n;

    if (minimal) {
        // A zero most-significant byte (ignoring the sign bit) is only allowed when the byte
        // below it has its top bit set, as in 0xff00 / 0xff80 for +-255. This also rejects
        // negative zero, 0x80.
        const last = bytes[bytes.length - 1];
        if ((last & 0x7f) == 0 && (bytes.length <= 1 || (bytes[bytes.length - 2] & 0x80) == 0)) {
            throw new ScriptIntError(ScriptIntErrorKind.NonMinimalPush);
        }
    }

    return scriptintParse(bytes);
}

function scriptintParse(bytes: Uint8Array): bigint {
    let n = 0n;
    let shift = 0n;
    for (const b of bytes) {
        n += BigInt(b) << shift;
        shift += 8n;
    }
    if (bytes[bytes.length - 1] & 0x80) {
        n &= (1n << (shift - 1n)) - 1n;
        n = -n;
    }
    return n;
}

export function readScriptint(bytes: Uint8Array, maxSize: number, minimal: boolean): bigint {
    try {
        return readScriptintSize(bytes, maxSize, minimal);
    } catch (e) {
        if (!(e instanceof ScriptIntError)) throw e;
        throw new ExecError(
            e.kind == ScriptIntErrorKind.NonMinimalPush ? ExecErrorCode.MinimalData : ExecErrorCode.ScriptIntNumericOverflow
        );
    }
}

export function readScriptintNonMinimal(bytes: Uint8Array, maxSize: number = DEFAULT_MAX_SCRIPTINT_SIZE): bigint {
    return readScriptint(bytes, maxSize, false);
}
