/**
 * ISO-4217 code registry, loaded from the bundled `iso4217.json` list.
 */

import codes from '../data/iso4217.json';

const registry: ReadonlySet<string> = new Set(codes);

export function isValidCurrencyCode(code: string): boolean {
    return registry.has(code);
}

/** All registered codes in ascending order. */
export function currencyCodes(): string[] {
    return [...registry].sort();
}
