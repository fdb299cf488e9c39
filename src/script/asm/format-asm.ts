import { toHex } from '../hex';
import { OP_0, OP_PUSHDATA1, OP_PUSHDATA2, OP_PUSHDATA4, OpcodeTable, defaultOpcodeTable } from '../opcodes';

export class ScriptFormatError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ScriptFormatError';
    }
}

function readLength(script: Uint8Array, offset: number, size: number): number {
    if (offset + size > script.length) throw new ScriptFormatError('unexpected end of script');
    let len = 0;
    for (let i = size - 1; i >= 0; i--) len = len * 0x100 + script[offset + i];
    return len;
}

/**
 * Renders script bytes as ASM that {@link parseAsm} reads back into the same bytes.
 * Pushes are written with their opcode, e.g. `OP_PUSHBYTES_2 e803`.
 */
export function formatAsm(script: Uint8Array, table: OpcodeTable = defaultOpcodeTable): string {
    const words: string[] = [];
    let i = 0;
    while (i < script.length) {
        const op = script[i++];
        if (op == OP_0) {
            words.push('OP_0');
            continue;
        }

        let len: number | undefined;
        if (op < OP_PUSHDATA1) {
            len = op;
        } else if (op == OP_PUSHDATA1 || op == OP_PUSHDATA2 || op == OP_PUSHDATA4) {
            const size = op == OP_PUSHDATA1 ? 1 : op == OP_PUSHDATA2 ? 2 : 4;
            len = readLength(script, i, size);
            i += size;
        }

        const name = table.toName(op);
        if (len === undefined) {
            words.push(name);
            continue;
        }
        if (i + len > script.length) throw new ScriptFormatError('push past end of script');
        words.push(name, toHex(script.subarray(i, i + len)));
        i += len;
    }
    return words.join(' ');
}
