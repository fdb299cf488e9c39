#!/usr/bin/env node
import * as fs from 'fs';
import minimist from 'minimist';
import { Logger } from 'sitka';

import { formatAsm } from '../script/asm/format-asm';
import { parseAsm } from '../script/asm/parse-asm';
import { parseHex, toHex } from '../script/hex';
import { formatLockTime, fromNum } from '../script/relative-locktime';
import { readScriptint, scriptintVec } from '../script/scriptint';
import { CliConf, OUTPUT_FORMATS, OutputFormat, cliConf } from './cli.conf';

const logger = Logger.getLogger({ name: 'script-asm' });

export const USAGE = [
    'usage: script-asm <command> [args]',
    '  assemble [--file <path>] [--format hex|asm] [<asm>...]',
    '  disassemble <hex>',
    '  scriptint encode <integer>',
    '  scriptint decode <hex> [--max-size <n>] [--non-minimal]',
    '  locktime <integer>',
    'negative integers go after --, e.g. scriptint encode -- -5'
].join('\n');

function parseInteger(text: string): bigint {
    if (!/^[+-]?[0-9]+$/.test(text)) throw new Error(`Invalid integer: '${text}'`);
    return BigInt(text);
}

function outputFormat(value: unknown, conf: CliConf): OutputFormat {
    if (value === undefined || value === '') return conf.outputFormat;
    const found = OUTPUT_FORMATS.find((f) => f === value);
    if (found === undefined) throw new Error(`Invalid output format: '${String(value)}'`);
    return found;
}

function maxSize(value: unknown, conf: CliConf): number {
    if (value === undefined) return conf.scriptintMaxSize;
    if (typeof value != 'string' && typeof value != 'number') throw new Error(`Invalid max size: '${String(value)}'`);
    const n = value === '' ? NaN : Number(value);
    if (!Number.isInteger(n)) throw new Error(`Invalid max size: '${String(value)}'`);
    return n;
}

/** Runs one command and returns what it prints. */
export function runCommand(argv: string[], conf: CliConf = cliConf): string {
    const args = minimist(argv, { string: ['_', 'file', 'format'], boolean: ['non-minimal'] });
    const positional = args._.map((a) => String(a));
    const command = positional.length > 0 ? positional[0] : 'help';
    const rest = positional.slice(1);

    switch (command) {
        case 'assemble': {
            const asm = args['file'] ? fs.readFileSync(args['file'], 'utf-8') : rest.join(' ');
            const script = parseAsm(asm);
            return outputFormat(args['format'], conf) == 'asm' ? formatAsm(script) : toHex(script);
        }
        case 'disassemble':
            return formatAsm(parseHex(rest.join('')));
        case 'scriptint': {
            const [action, value] = [rest[0] ?? '', rest[1] ?? ''];
            if (action == 'encode') return toHex(scriptintVec(parseInteger(value)));
            if (action == 'decode') {
                const minimal = args['non-minimal'] ? false : conf.scriptintRequireMinimal;
                return readScriptint(parseHex(value), maxSize(args['max-size'], conf), minimal).toString();
            }
            throw new Error(`Unknown scriptint action: '${action}'`);
        }
        case 'locktime': {
            const lockTime = fromNum(parseInteger(rest[0] ?? ''));
            return lockTime ? formatLockTime(lockTime) : 'disabled';
        }
        case 'help':
            return USAGE;
        default:
            throw new Error(`Unknown command: '${command}'\n${USAGE}`);
    }
}

function main() {
    logger.debug(`configuration: ${JSON.stringify(cliConf)}`);
    try {
        console.log(runCommand(process.argv.slice(2)));
    } catch (e) {
        logger.error(e instanceof Error ? e.message : String(e));
        process.exitCode = 1;
    }
}

if (require.main === module) {
    main();
}
