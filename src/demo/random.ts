/**
 * Creates a deterministic pseudo-random number generator (Mulberry32).
 * @param seed - The initial seed value.
 * @returns A function returning a number in [0, 1).
 */
export function createRNG(seed: number): () => number {
    return function () {
        let t = seed += 0x6D2B79F5;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export function pick<T>(items: ReadonlyArray<T>, random: () => number): T {
    return items[Math.floor(random() * items.length)];
}

/** Reads `--name=value` as a number, falling back when absent or malformed. */
export function numericFlag(args: ReadonlyArray<string>, name: string, fallback: number): number {
    const arg = args.find(a => a.startsWith(`--${name}=`));
    const parsed = arg ? Number(arg.slice(name.length + 3)) : NaN;
    return Number.isFinite(parsed) ? parsed : fallback;
}
