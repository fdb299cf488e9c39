import { OP_0, OP_1, OP_16, OP_1NEGATE, OP_PUSHDATA1, OP_PUSHDATA2, OP_PUSHDATA4 } from './opcodes';
import { scriptintVec } from './scriptint';

export const MAX_PUSH_SIZE = 0xffffffff;

/**
 * First opcode of the shortest push of `length` bytes, or undefined when no length header can
 * hold it.
 */
export function minimalPushOpcode(length: number): number | undefined {
    if (length < OP_PUSHDATA1) return length;
    if (length < 0x100) return OP_PUSHDATA1;
    if (length < 0x10000) return OP_PUSHDATA2;
    if (length <= MAX_PUSH_SIZE) return OP_PUSHDATA4;
    return undefined;
}

export class ScriptBuilder {
    private bytes: number[] = [];

    pushOpcode(op: number): ScriptBuilder {
        if (!Number.isInteger(op) || op < 0 || op > 0xff) throw new RangeError(`Invalid opcode: ${op}`);
        this.bytes.push(op);
        return this;
    }

    pushSlice(data: Uint8Array): ScriptBuilder {
        const op = minimalPushOpcode(data.length);
        if (op === undefined) throw new RangeError(`Push of ${data.length} bytes exceeds maximum size`);

        const len = data.length;
        if (op < OP_PUSHDATA1) {
            this.bytes.push(len);
        } else if (op == OP_PUSHDATA1) {
            this.bytes.push(op, len);
        } else if (op == OP_PUSHDATA2) {
            this.bytes.push(op, len & 0xff, len >>> 8);
        } else {
            this.bytes.push(op, len & 0xff, (len >>> 8) & 0xff, (len >>> 16) & 0xff, len >>> 24);
        }
        for (const b of data) this.bytes.push(b);
        return this;
    }

    pushInt(n: bigint): ScriptBuilder {
        if (n == -1n) return this.pushOpcode(OP_1NEGATE);
        if (n == 0n) return this.pushOpcode(OP_0);
        if (n >= 1n && n <= BigInt(OP_16 - OP_1 + 1)) return this.pushOpcode(OP_1 + Number(n) - 1);
        return this.pushSlice(scriptintVec(n));
    }

    get length(): number {
        return this.bytes.length;
    }

    toBuffer(): Buffer {
        return Buffer.from(this.bytes);
    }
}
