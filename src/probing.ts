/**
 * @module probing
 * Double-hashing probe arithmetic as pure functions of (hash, capacity, attempt).
 *
 * With a prime capacity N and a step in [1, N - 1], gcd(step, N) = 1, so the
 * first N probes form a permutation of all slot indices.
 */

/** Home slot: `h1 = hash mod capacity`. */
export function primaryIndex(hash: number, capacity: number): number {
    return hash % capacity;
}

/** Probe step: `h2 = 1 + (hash2 mod (capacity - 1))`. Never 0. */
export function probeStep(hash2: number, capacity: number): number {
    return 1 + (hash2 % (capacity - 1));
}

/** Slot examined on the given attempt (0-based). */
export function probeIndex(home: number, step: number, attempt: number, capacity: number): number {
    return (home + mulMod(attempt % capacity, step, capacity)) % capacity;
}

/** (a * b) mod m for a, b, m < 2^31 without leaving the exact range of a double. */
function mulMod(a: number, b: number, m: number): number {
    const hi = Math.floor(b / 0x10000);
    const lo = b % 0x10000;
    return (((a * hi) % m) * 0x10000 + a * lo) % m;
}

/**
 * The full probe sequence of a key: `capacity` slot indices starting at `h1`.
 */
export function* probeSequence(hash: number, hash2: number, capacity: number): Generator<number, void, undefined> {
    const home = primaryIndex(hash, capacity);
    const step = probeStep(hash2, capacity);
    let idx = home;
    for (let attempt = 0; attempt < capacity; attempt++) {
        yield idx;
        idx += step;
        if (idx >= capacity) idx -= capacity;
    }
}
