type Parser<T> = (value: string) => T;

function parseEnv<T>(name: string, parser: Parser<T>, defaultValue?: T): T {
    const value = process.env[name];
    if (value === undefined) {
        if (defaultValue === undefined) {
            throw new Error(`Missing environment variable: '${name}'`);
        }
        return defaultValue;
    }
    try {
        return parser(value);
    } catch (e) {
        const error = e as Error;
        throw new Error(`${error.message} for environment variable: '${name}'`);
    }
}

function makeParsingError(value: string, type: string): Error {
    return new Error(`Invalid ${type} value: '${value}'`);
}

function parseString(value: string): string {
    if (value === '') {
        throw makeParsingError(value, 'string');
    }
    return value;
}

function parseInteger(value: string): number {
    const parsed = Number(value.trim());
    if (value.trim() === '' || !Number.isInteger(parsed)) {
        throw makeParsingError(value, 'integer');
    }
    return parsed;
}

function parseBoolean(value: string): boolean {
    const TRUE_VALUES = new Set(['true', 't', '1', 'yes', 'y', 'on']);
    const FALSE_VALUES = new Set(['false', 'f', '0', 'no', 'n', 'off']);

    const lowerValue = value.toLowerCase();
    if (TRUE_VALUES.has(lowerValue)) return true;
    if (FALSE_VALUES.has(lowerValue)) return false;
    throw makeParsingError(value, 'boolean');
}

function oneOfParser<T extends string>(values: readonly T[]): Parser<T> {
    return (value: string) => {
        const found = values.find((v) => v === value);
        if (found === undefined) throw makeParsingError(value, `${values.join('|')}`);
        return found;
    };
}

export const parse = {
    string: (name: string, defaultValue?: string): string => parseEnv(name, parseString, defaultValue),
    integer: (name: string, defaultValue?: number): number => parseEnv(name, parseInteger, defaultValue),
    boolean: (name: string, defaultValue?: boolean): boolean => parseEnv(name, parseBoolean, defaultValue),
    oneOf: <T extends string>(name: string, values: readonly T[], defaultValue?: T): T =>
        parseEnv(name, oneOfParser(values), defaultValue)
};
