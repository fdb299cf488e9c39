import { ScriptBuilder, minimalPushOpcode } from '../builder';
import { tryParseHex } from '../hex';
import { OP_0, OpcodeTable, defaultOpcodeTable } from '../opcodes';
import { isI64 } from '../scriptint';
import { Position, iterWords } from './tokenizer';

export enum AsmParseErrorKind {
    UnexpectedEOF = 'UnexpectedEOF',
    UnknownInstruction = 'UnknownInstruction',
    InvalidHex = 'InvalidHex',
    PushExceedsMaxSize = 'PushExceedsMaxSize',
    // not necessarily invalid script, but the builder cannot produce such a push
    NonMinimalBytePush = 'NonMinimalBytePush'
}

const descriptions: { [kind in AsmParseErrorKind]: string } = {
    [AsmParseErrorKind.UnexpectedEOF]: 'unexpected end of ASM',
    [AsmParseErrorKind.UnknownInstruction]: 'unknown instruction',
    [AsmParseErrorKind.InvalidHex]: 'invalid hex',
    [AsmParseErrorKind.PushExceedsMaxSize]: 'push exceeds maximum size',
    [AsmParseErrorKind.NonMinimalBytePush]: 'non-minimal byte push'
};

export function describeAsmParseErrorKind(kind: AsmParseErrorKind): string {
    return descriptions[kind];
}

export class ParseAsmError extends Error {
    /** (line, word), both zero-based; the word index counts whitespace-separated chunks. */
    readonly position: Position;
    readonly kind: AsmParseErrorKind;

    constructor(position: Position, kind: AsmParseErrorKind) {
        super(`${descriptions[kind]} at line ${position[0]}, word ${position[1]}`);
        this.name = 'ParseAsmError';
        this.position = position;
        this.kind = kind;
    }
}

export function stripAngleBrackets(word: string): string {
    return word.length >= 2 && word.startsWith('<') && word.endsWith('>') ? word.slice(1, -1) : word;
}

export function stripHexPrefix(word: string): string {
    return word.startsWith('0x') ? word.slice(2) : word;
}

export function parseI64(word: string): bigint | undefined {
    if (!/^[+-]?[0-9]+$/.test(word)) return undefined;
    const n = BigInt(word);
    return isI64(n) ? n : undefined;
}

/**
 * Assembles script ASM into script bytes.
 *
 * Words are, in order of precedence: `OP_0`, an opcode name from `table` (a push opcode takes
 * the following word as raw hex), a decimal integer, or hex data with an optional `0x` prefix.
 * Integers and hex may be wrapped in `<...>`. Comments start at `#` or `//`.
 *
 * Throws a {@link ParseAsmError} on the first word that cannot be assembled.
 */
export function parseAsm(asm: string, table: OpcodeTable = defaultOpcodeTable): Buffer {
    const builder = new ScriptBuilder();
    const words = iterWords(asm);

    for (let next = words.next(); !next.done; next = words.next()) {
        const { position, text } = next.value;

        // the formatter writes the empty push this way
        if (text == 'OP_0') {
            builder.pushOpcode(OP_0);
            continue;
        }

        const op = table.fromName(text);
        if (op !== undefined) {
            if (table.isPushBytes(op) || table.isPushData(op)) {
                const operand = words.next();
                if (operand.done) throw new ParseAsmError(position, AsmParseErrorKind.UnexpectedEOF);
                const data = tryParseHex(operand.value.text);
                if (!data) throw new ParseAsmError(operand.value.position, AsmParseErrorKind.InvalidHex);

                const expected = minimalPushOpcode(data.length);
                if (expected === undefined)
                    throw new ParseAsmError(operand.value.position, AsmParseErrorKind.PushExceedsMaxSize);
                if (op != expected) throw new ParseAsmError(position, AsmParseErrorKind.NonMinimalBytePush);

                builder.pushSlice(data);
            } else {
                builder.pushOpcode(op);
            }
            continue;
        }

        const literal = stripAngleBrackets(text);

        const n = parseI64(literal);
        if (n !== undefined) {
            builder.pushInt(n);
            continue;
        }

        const data = tryParseHex(stripHexPrefix(literal));
        if (!data) throw new ParseAsmError(position, AsmParseErrorKind.UnknownInstruction);
        if (minimalPushOpcode(data.length) === undefined)
            throw new ParseAsmError(position, AsmParseErrorKind.PushExceedsMaxSize);
        builder.pushSlice(data);
    }

    return builder.toBuffer();
}
