/**
 * Collision experiment: random inserts, then random deletes, of ISO-4217
 * codes into fresh double hashing maps; reports the mean collision count.
 *
 * Usage: tsx src/demo/collisions.ts --trials=1000 --inserts=70 --deletes=30 --base=92821 --seed=1337
 */

import { currencyCodes } from '../currency/registry';
import { DoubleHashingHashMap } from '../double-hashing-hash-map';
import { DEFAULT_SECONDARY_BASE } from '../hashing';
import { createRNG, numericFlag, pick } from './random';

export interface ExperimentOptions {
    trials: number;
    inserts: number;
    deletes: number;
    /** Polynomial base of the secondary hash. */
    base: number;
    seed: number;
    loadFactor?: number;
}

export interface ExperimentResult {
    base: number;
    trials: number;
    meanCollisions: number;
    maxCollisions: number;
}

export function runCollisionExperiment(options: ExperimentOptions): ExperimentResult {
    const codes = currencyCodes();
    const random = createRNG(options.seed);
    let total = 0;
    let worst = 0;

    for (let t = 0; t < options.trials; t++) {
        const map = new DoubleHashingHashMap<string, string>({
            secondaryBase: options.base,
            loadFactor: options.loadFactor,
        });
        for (let i = 0; i < options.inserts; i++) map.insert(pick(codes, random), 'value');
        for (let i = 0; i < options.deletes; i++) map.delete(pick(codes, random));

        const c = map.collisionCount();
        total += c;
        if (c > worst) worst = c;
    }

    return {
        base: options.base,
        trials: options.trials,
        meanCollisions: options.trials === 0 ? 0 : total / options.trials,
        maxCollisions: worst,
    };
}

if (require.main === module) {
    const args = process.argv.slice(2);
    const options: ExperimentOptions = {
        trials: numericFlag(args, 'trials', 1000),
        inserts: numericFlag(args, 'inserts', 70),
        deletes: numericFlag(args, 'deletes', 30),
        base: numericFlag(args, 'base', DEFAULT_SECONDARY_BASE),
        seed: numericFlag(args, 'seed', 1337),
    };
    console.log(`[Config] trials=${options.trials} inserts=${options.inserts} deletes=${options.deletes} base=${options.base} seed=${options.seed}`);
    const result = runCollisionExperiment(options);
    console.log(`[Stats] mean collisions: ${result.meanCollisions.toFixed(3)}`);
    console.log(`[Stats] worst trial:     ${result.maxCollisions}`);
}
