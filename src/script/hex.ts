const HEX_RE = /^(?:[0-9a-fA-F]{2})*$/;

// Buffer.from(s, 'hex') silently stops at the first bad pair, so validate first.
export function tryParseHex(text: string): Buffer | undefined {
    if (!HEX_RE.test(text)) return undefined;
    return Buffer.from(text, 'hex');
}

export function parseHex(text: string): Buffer {
    const bytes = tryParseHex(text);
    if (!bytes) throw new Error(`Invalid hex string: '${text}'`);
    return bytes;
}

export function toHex(bytes: Uint8Array): string {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex');
}
