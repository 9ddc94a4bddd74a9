/**
 * Recursive Length Prefix Encoding
 *
 * Byte-compatible with the RLP used by Ethereum-family chains:
 * - a single byte below 0x80 is its own encoding
 * - byte strings of 0-55 bytes: 0x80 + len, then the bytes
 * - longer byte strings: 0xb7 + len(len), then len, then the bytes
 * - lists: same scheme with 0xc0 / 0xf7 over the concatenated items
 */

import { concatBytes, hexToBytes, type Hex } from 'viem';

/**
 * Typed encoding node.
 *
 * `uint` and `bigint` both encode as minimal big-endian byte strings; they are
 * kept apart so that 64-bit fields are range-checked on construction.
 */
export type RlpNode =
    | { kind: 'uint'; value: bigint }
    | { kind: 'bigint'; value: bigint }
    | { kind: 'bytes'; value: Uint8Array }
    | { kind: 'null' }
    | { kind: 'list'; items: readonly RlpNode[] };

export const UINT64_MAX = (1n << 64n) - 1n;

const SHORT_STRING_OFFSET = 0x80;
const SHORT_LIST_OFFSET = 0xc0;
const SHORT_PAYLOAD_MAX = 55;

/**
 * Shortest big-endian byte form of a non-negative integer.
 * Zero is the empty byte string.
 */
export function minimalBigEndian(value: bigint): Uint8Array {
    if (value < 0n) {
        throw new RangeError(`Cannot encode negative integer ${value}`);
    }
    if (value === 0n) {
        return new Uint8Array(0);
    }

    let hex = value.toString(16);
    if (hex.length % 2 !== 0) {
        hex = `0${hex}`;
    }
    return hexToBytes(`0x${hex}`);
}

export function rlpUint(value: bigint | number): RlpNode {
    const n = BigInt(value);
    if (n < 0n || n > UINT64_MAX) {
        throw new RangeError(`Value ${n} does not fit in an unsigned 64-bit integer`);
    }
    return { kind: 'uint', value: n };
}

export function rlpBigInt(value: bigint): RlpNode {
    if (value < 0n) {
        throw new RangeError(`Cannot encode negative integer ${value}`);
    }
    return { kind: 'bigint', value };
}

export function rlpBytes(value: Uint8Array): RlpNode {
    return { kind: 'bytes', value };
}

export function rlpHex(value: Hex): RlpNode {
    return rlpBytes(hexToBytes(value));
}

export function rlpNull(): RlpNode {
    return { kind: 'null' };
}

export function rlpList(items: readonly RlpNode[]): RlpNode {
    return { kind: 'list', items };
}

function encodeLength(length: number, offset: number): Uint8Array {
    if (length <= SHORT_PAYLOAD_MAX) {
        return Uint8Array.of(offset + length);
    }
    const lengthBytes = minimalBigEndian(BigInt(length));
    return concatBytes([Uint8Array.of(offset + SHORT_PAYLOAD_MAX + lengthBytes.length), lengthBytes]);
}

function encodeString(bytes: Uint8Array): Uint8Array {
    if (bytes.length === 1 && bytes[0] < SHORT_STRING_OFFSET) {
        return Uint8Array.of(bytes[0]);
    }
    return concatBytes([encodeLength(bytes.length, SHORT_STRING_OFFSET), bytes]);
}

/**
 * Encode a node (recursively for lists).
 *
 * @returns Encoded bytes; the same node always yields the same bytes
 */
export function encodeRlp(node: RlpNode): Uint8Array {
    switch (node.kind) {
        case 'uint':
        case 'bigint':
            return encodeString(minimalBigEndian(node.value));
        case 'bytes':
            return encodeString(node.value);
        case 'null':
            // An absent value is the empty string, distinct from any present value
            return Uint8Array.of(SHORT_STRING_OFFSET);
        case 'list': {
            const payload = concatBytes(node.items.map(encodeRlp));
            return concatBytes([encodeLength(payload.length, SHORT_LIST_OFFSET), payload]);
        }
        default: {
            const unreachable: never = node;
            throw new Error(`Unknown RLP node: ${JSON.stringify(unreachable)}`);
        }
    }
}

/**
 * Encode a flat sequence of nodes as one top-level list.
 */
export function encodeRlpList(items: readonly RlpNode[]): Uint8Array {
    return encodeRlp(rlpList(items));
}
