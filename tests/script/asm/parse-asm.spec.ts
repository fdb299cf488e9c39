import { describe, expect, it } from '@jest/globals';

import {
    AsmParseErrorKind,
    ParseAsmError,
    describeAsmParseErrorKind,
    parseAsm,
    parseI64,
    stripAngleBrackets,
    stripHexPrefix
} from '../../../src/script/asm/parse-asm';
import { NamedOpcodeTable } from '../../../src/script/opcodes';

const pubkeyHash = '00112233445566778899aabbccddeeff00112233';

function asmHex(asm: string): string {
    return parseAsm(asm).toString('hex');
}

function parseError(asm: string): ParseAsmError {
    try {
        parseAsm(asm);
    } catch (e) {
        if (e instanceof ParseAsmError) return e;
        throw e;
    }
    throw new Error(`expected '${asm}' to fail`);
}

describe('word transforms', () => {
    it('strips one pair of angle brackets', () => {
        expect(stripAngleBrackets('<5>')).toBe('5');
        expect(stripAngleBrackets('<<5>>')).toBe('<5>');
        expect(stripAngleBrackets('<>')).toBe('');
        expect(stripAngleBrackets('<5')).toBe('<5');
        expect(stripAngleBrackets('5>')).toBe('5>');
    });

    it('strips a hex prefix', () => {
        expect(stripHexPrefix('0xff')).toBe('ff');
        expect(stripHexPrefix('0Xff')).toBe('0Xff');
        expect(stripHexPrefix('ff')).toBe('ff');
    });

    it('parses 64-bit decimal integers', () => {
        expect(parseI64('42')).toBe(42n);
        expect(parseI64('+42')).toBe(42n);
        expect(parseI64('-42')).toBe(-42n);
        expect(parseI64('9223372036854775807')).toBe(9223372036854775807n);
        expect(parseI64('-9223372036854775808')).toBe(-9223372036854775808n);
        expect(parseI64('9223372036854775808')).toBeUndefined();
        expect(parseI64('0x10')).toBeUndefined();
        expect(parseI64('1e3')).toBeUndefined();
        expect(parseI64('-')).toBeUndefined();
    });
});

describe('parseAsm', () => {
    it('assembles OP_0 as the empty push', () => {
        expect(asmHex('OP_0')).toBe('00');
        expect(asmHex('OP_FALSE')).toBe('00');
    });

    it('assembles a pay-to-pubkey-hash script', () => {
        const asm = `OP_DUP OP_HASH160 OP_PUSHBYTES_20 ${pubkeyHash} OP_EQUALVERIFY OP_CHECKSIG`;
        expect(asmHex(asm)).toBe(`76a914${pubkeyHash}88ac`);
    });

    it('assembles explicit pushes', () => {
        expect(asmHex('OP_PUSHBYTES_1 ff')).toBe('01ff');
        expect(asmHex('OP_PUSHBYTES_4 DEADBEEF')).toBe('04deadbeef');
        const data = 'ab'.repeat(76);
        expect(asmHex(`OP_PUSHDATA1 ${data}`)).toBe(`4c4c${data}`);
        const big = 'cd'.repeat(256);
        expect(asmHex(`OP_PUSHDATA2 ${big}`)).toBe(`4d0001${big}`);
    });

    it('assembles named opcodes and aliases', () => {
        expect(asmHex('OP_TRUE OP_PUSHNUM_2 OP_PUSHNUM_NEG1')).toBe('51524f');
        expect(asmHex('OP_CHECKSEQUENCEVERIFY')).toBe('b2');
        expect(asmHex('OP_RETURN_192')).toBe('c0');
    });

    it('assembles integers as minimal pushes', () => {
        expect(asmHex('-1')).toBe('4f');
        expect(asmHex('0')).toBe('00');
        expect(asmHex('1 16')).toBe('5160');
        expect(asmHex('17')).toBe('0111');
        expect(asmHex('255')).toBe('02ff00');
        expect(asmHex('1000')).toBe('02e803');
        expect(asmHex('-1000')).toBe('02e883');
        expect(asmHex('<-129>')).toBe('028180');
        expect(asmHex('9223372036854775807')).toBe('08ffffffffffffff7f');
    });

    it('treats bracketed numbers like bare ones', () => {
        expect(asmHex('<5>')).toBe(asmHex('5'));
        expect(asmHex('<5>')).toBe('55');
    });

    it('assembles hex data in every accepted form', () => {
        expect(asmHex('deadbeef')).toBe('04deadbeef');
        expect(asmHex('0xdeadbeef')).toBe('04deadbeef');
        expect(asmHex('<deadbeef>')).toBe('04deadbeef');
        expect(asmHex('<0xdeadbeef>')).toBe('04deadbeef');
        expect(asmHex('0a')).toBe('010a');
        expect(asmHex('0x')).toBe('00');
        expect(asmHex('<>')).toBe('00');
        const data = 'ef'.repeat(80);
        expect(asmHex(data)).toBe(`4c50${data}`);
    });

    it('prefers a decimal reading over hex', () => {
        expect(asmHex('10')).toBe('5a');
        expect(asmHex('0x10')).toBe('0110');
    });

    it('ignores comments', () => {
        expect(asmHex('OP_1 # one\nOP_2 // two\n# OP_3\n')).toBe('5152');
    });

    it('reports a push opcode at the end of input', () => {
        const error = parseError('OP_DUP\nOP_PUSHBYTES_2 # no data');
        expect(error.kind).toBe(AsmParseErrorKind.UnexpectedEOF);
        expect(error.position).toEqual([1, 0]);
    });

    it('reports invalid push data at the data word', () => {
        const error = parseError('OP_PUSHBYTES_1\nzz');
        expect(error.kind).toBe(AsmParseErrorKind.InvalidHex);
        expect(error.position).toEqual([1, 0]);

        const prefixed = parseError('OP_DUP OP_PUSHBYTES_1 0xff');
        expect(prefixed.kind).toBe(AsmParseErrorKind.InvalidHex);
        expect(prefixed.position).toEqual([0, 2]);
    });

    it('rejects pushes whose opcode does not match the data length', () => {
        const error = parseError('OP_PUSHDATA1 00');
        expect(error.kind).toBe(AsmParseErrorKind.NonMinimalBytePush);
        expect(error.position).toEqual([0, 0]);

        expect(parseError('OP_DUP OP_PUSHBYTES_2 ff').position).toEqual([0, 1]);
        expect(parseError(`OP_PUSHDATA2 ${'ab'.repeat(76)}`).kind).toBe(AsmParseErrorKind.NonMinimalBytePush);
    });

    it('reports unknown instructions', () => {
        const error = parseError('deadbeefgg');
        expect(error.kind).toBe(AsmParseErrorKind.UnknownInstruction);
        expect(error.position).toEqual([0, 0]);

        expect(parseError('OP_DUP\n  OP_FOO').position).toEqual([1, 0]);
        expect(parseError('0x5').kind).toBe(AsmParseErrorKind.UnknownInstruction);
        expect(parseError('9223372036854775808').kind).toBe(AsmParseErrorKind.UnknownInstruction);
    });

    it('treats a byte order mark as part of the word', () => {
        const error = parseError('\ufeffOP_1');
        expect(error.kind).toBe(AsmParseErrorKind.UnknownInstruction);
        expect(error.position).toEqual([0, 0]);
    });

    it('describes errors with a fixed phrase and the position', () => {
        const error = parseError('OP_PUSHDATA1 00');
        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('ParseAsmError');
        expect(error.message).toBe('non-minimal byte push at line 0, word 0');
        expect(describeAsmParseErrorKind(AsmParseErrorKind.UnexpectedEOF)).toBe('unexpected end of ASM');
        expect(describeAsmParseErrorKind(AsmParseErrorKind.PushExceedsMaxSize)).toBe('push exceeds maximum size');
    });

    it('resolves names through the given table', () => {
        const table = new NamedOpcodeTable({ OP_NOTHING: 0x61, OP_PUSHBYTES_1: 0x01 });
        expect(parseAsm('OP_NOTHING OP_PUSHBYTES_1 07', table).toString('hex')).toBe('610107');
        expect(() => parseAsm('OP_DUP', table)).toThrow('unknown instruction at line 0, word 0');
    });
});
