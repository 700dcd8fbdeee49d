/**
 * @module hashing
 * Hash codes for hash map keys.
 *
 * Two independent functions are needed for double hashing:
 * - `hashCode`: FNV-1a for strings, bit mixing for numbers, `.hashCode` for objects.
 * - `secondaryHashCode`: a polynomial rolling hash with a configurable base `z`.
 *
 * Both return unsigned 32-bit integers.
 */

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

/**
 * Interface for objects usable as hash map keys.
 */
export interface Hashable {
    /** 32-bit hash code. Must be stable while the object is stored in a map. */
    readonly hashCode: number;
    equals(other: unknown): boolean;
}

export type HashKey = number | string | Hashable;

// ============================================================================
// 2. PRIMARY HASH (FNV-1a / integer mixing)
// ============================================================================

const FNV_PRIME = 16777619;
const FNV_OFFSET = 2166136261;

/** Every NaN hashes alike, whatever its bit pattern. */
const NAN_HASH = 0x7ff80000;

const floatBuffer = new ArrayBuffer(8);
const view = new DataView(floatBuffer);

function hashNumber(val: number): number {
    if ((val | 0) === val) {
        let h = val;
        h = Math.imul((h >>> 16) ^ h, 0x45d9f3b);
        h = Math.imul((h >>> 16) ^ h, 0x45d9f3b);
        h = (h >>> 16) ^ h;
        return h >>> 0;
    }
    if (Number.isNaN(val)) return NAN_HASH;
    view.setFloat64(0, val, true);
    let h = FNV_OFFSET;
    h ^= view.getInt32(0, true);
    h = Math.imul(h, FNV_PRIME);
    h ^= view.getInt32(4, true);
    h = Math.imul(h, FNV_PRIME);
    return h >>> 0;
}

function hashString(str: string): number {
    let h = FNV_OFFSET;
    const len = str.length;
    for (let i = 0; i < len; i++) {
        h ^= str.charCodeAt(i);
        h = Math.imul(h, FNV_PRIME);
    }
    return h >>> 0;
}

export function hashCode(key: HashKey): number {
    if (typeof key === 'number') return hashNumber(key);
    if (typeof key === 'string') return hashString(key);
    return key.hashCode >>> 0;
}

// ============================================================================
// 3. SECONDARY HASH (polynomial)
// ============================================================================

/** Default polynomial base. Prime, and large enough to spread three-letter codes. */
export const DEFAULT_SECONDARY_BASE = 92821;

/**
 * Polynomial hash `sum(c_k * z^k)` over the key's UTF-16 code units, reduced mod 2^32.
 * Non-string keys are hashed over the four bytes of their primary hash code.
 */
export function secondaryHashCode(key: HashKey, z: number = DEFAULT_SECONDARY_BASE): number {
    let h = 0;
    let power = 1;
    if (typeof key === 'string') {
        for (let i = 0; i < key.length; i++) {
            h = (h + Math.imul(key.charCodeAt(i), power)) | 0;
            power = Math.imul(power, z);
        }
        return h >>> 0;
    }
    const primary = hashCode(key);
    for (let shift = 0; shift < 32; shift += 8) {
        h = (h + Math.imul((primary >>> shift) & 0xff, power)) | 0;
        power = Math.imul(power, z);
    }
    return h >>> 0;
}

// ============================================================================
// 4. EQUALITY
// ============================================================================

/** `===`, except that NaN equals NaN. Objects compare through `equals`. */
export function keysEqual(a: HashKey, b: HashKey): boolean {
    if (a === b) return true;
    if (typeof a === 'number' && typeof b === 'number') return Number.isNaN(a) && Number.isNaN(b);
    if (typeof a === 'object' && typeof b === 'object') return a.equals(b);
    return false;
}
