import { opcodes } from 'bitcoinjs-lib';

export const OP_0 = 0x00;
export const OP_PUSHBYTES_75 = 0x4b;
export const OP_PUSHDATA1 = 0x4c;
export const OP_PUSHDATA2 = 0x4d;
export const OP_PUSHDATA4 = 0x4e;
export const OP_1NEGATE = 0x4f;
export const OP_1 = 0x51;
export const OP_16 = 0x60;

/**
 * Name lookup and push classification used by the assembler and the formatter.
 * Push-size arithmetic only relies on the two predicates and OP_PUSHDATA1, so a table
 * with extra aliases can be swapped in without touching it.
 */
export interface OpcodeTable {
    fromName(name: string): number | undefined;
    toName(op: number): string;
    isPushBytes(op: number): boolean;
    isPushData(op: number): boolean;
}

export class NamedOpcodeTable implements OpcodeTable {
    private byName = new Map<string, number>();
    private byCode = new Map<number, string>();

    constructor(names: { [name: string]: number }) {
        for (const [name, op] of Object.entries(names)) {
            this.byName.set(name, op);
            this.byCode.set(op, name);
        }
    }

    fromName(name: string): number | undefined {
        const op = this.byName.get(name);
        if (op !== undefined) return op;
        const match = /^OP_RETURN_(0|[1-9]\d{0,2})$/.exec(name);
        if (match && Number(match[1]) <= 0xff && !this.byCode.has(Number(match[1]))) return Number(match[1]);
        return undefined;
    }

    toName(op: number): string {
        return this.byCode.get(op) ?? `OP_RETURN_${op}`;
    }

    isPushBytes(op: number): boolean {
        return op > OP_0 && op <= OP_PUSHBYTES_75;
    }

    isPushData(op: number): boolean {
        return op == OP_PUSHDATA1 || op == OP_PUSHDATA2 || op == OP_PUSHDATA4;
    }
}

function explicitPushNames(): { [name: string]: number } {
    const names: { [name: string]: number } = { OP_PUSHBYTES_0: OP_0 };
    for (let n = 1; n <= OP_PUSHBYTES_75; n++) names[`OP_PUSHBYTES_${n}`] = n;
    names['OP_PUSHNUM_NEG1'] = OP_1NEGATE;
    for (let n = 1; n <= 16; n++) names[`OP_PUSHNUM_${n}`] = OP_1 + n - 1;
    return names;
}

// later entries win the reverse mapping, so the explicit push names are canonical
export const defaultOpcodeTable: OpcodeTable = new NamedOpcodeTable({
    ...opcodes,
    ...explicitPushNames()
});
