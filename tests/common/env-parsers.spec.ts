import { afterEach, describe, expect, it } from '@jest/globals';
import { parse } from '../../src/common/env-parser';

describe('parseEnv', () => {
    const envVarName = 'SCRIPT_ASM_TEST';

    afterEach(() => {
        delete process.env[envVarName];
    });

    it('parse a string', () => {
        process.env[envVarName] = 'test';
        expect(parse.string(envVarName)).toEqual('test');
    });

    it('get default when parsing a missing string', () => {
        expect(parse.string(envVarName, 'default')).toEqual('default');
    });

    it('throw an error on parsing a missing value without a default', () => {
        expect(() => parse.integer(envVarName)).toThrow(`Missing environment variable: '${envVarName}'`);
    });

    it('throw an error on parsing an empty string', () => {
        process.env[envVarName] = '';
        expect(() => parse.string(envVarName)).toThrow(
            `Invalid string value: '' for environment variable: '${envVarName}'`
        );
    });

    it('parse an integer', () => {
        process.env[envVarName] = '8';
        expect(parse.integer(envVarName, 4)).toEqual(8);
    });

    it('throw an error on parsing invalid integers', () => {
        for (const value of ['3.14', 'invalid', '', ' ']) {
            process.env[envVarName] = value;
            expect(() => parse.integer(envVarName)).toThrow(
                `Invalid integer value: '${value}' for environment variable: '${envVarName}'`
            );
        }
    });

    it('parse booleans', () => {
        for (const value of ['true', 'T', '1', 'yes', 'y', 'on']) {
            process.env[envVarName] = value;
            expect(parse.boolean(envVarName)).toEqual(true);
        }
        for (const value of ['false', 'F', '0', 'no', 'n', 'off']) {
            process.env[envVarName] = value;
            expect(parse.boolean(envVarName)).toEqual(false);
        }
    });

    it('throw an error on parsing invalid booleans', () => {
        process.env[envVarName] = 'maybe';
        expect(() => parse.boolean(envVarName)).toThrow(
            `Invalid boolean value: 'maybe' for environment variable: '${envVarName}'`
        );
    });

    it('parse one of a set of values', () => {
        process.env[envVarName] = 'asm';
        expect(parse.oneOf(envVarName, ['hex', 'asm'])).toEqual('asm');
        delete process.env[envVarName];
        expect(parse.oneOf(envVarName, ['hex', 'asm'], 'hex')).toEqual('hex');
    });

    it('throw an error on values outside the set', () => {
        process.env[envVarName] = 'xml';
        expect(() => parse.oneOf(envVarName, ['hex', 'asm'])).toThrow(
            `Invalid hex|asm value: 'xml' for environment variable: '${envVarName}'`
        );
    });
});
