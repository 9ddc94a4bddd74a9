import { hexToBigInt, type Hex } from 'viem';

/**
 * Require a field the source may omit.
 * Missing signature data is never zero-filled: the hash would be meaningless.
 *
 * @param source - Label of the representation (for error messages)
 */
export function requireField<T>(source: string, name: string, value: T | null | undefined): T {
    if (value === undefined || value === null) {
        throw new Error(`${source} transaction is missing required field ${name}`);
    }
    return value;
}

/**
 * Hex quantity to bigint; "0x" reads as zero.
 */
export function hexQuantity(value: Hex): bigint {
    return value === '0x' ? 0n : hexToBigInt(value);
}
