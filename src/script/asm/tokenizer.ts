export type Position = [line: number, word: number];

export interface Word {
    position: Position;
    text: string;
}

/** Drops everything from the first `#`, then everything from the first `//` that remains. */
export function stripComment(line: string): string {
    const hash = line.indexOf('#');
    const content = hash < 0 ? line : line.slice(0, hash);
    const slashes = content.indexOf('//');
    return slashes < 0 ? content : content.slice(0, slashes);
}

// Unicode White_Space; U+FEFF (byte order mark) is not part of it
const WHITESPACE = /[\t\n\v\f\r \u0085\u00a0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+/;

export function* iterWords(asm: string): Generator<Word> {
    const lines = asm.split('\n');
    for (let line = 0; line < lines.length; line++) {
        const words = stripComment(lines[line])
            .split(WHITESPACE)
            .filter((w) => w.length > 0);
        for (let word = 0; word < words.length; word++) {
            yield { position: [line, word], text: words[word] };
        }
    }
}
