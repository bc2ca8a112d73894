/**
 * ENTRY POINT
 *
 * Runs the example order with configuration from the environment.
 *
 * Run this with: npm start
 */
import {makeStoreEffects} from './effects/EffectsFactory';
import {runFromEnv} from './exampleOrder';

const storeEffects = makeStoreEffects();
const exitCode = runFromEnv(process.env)(storeEffects);
if (exitCode !== 0) {
    process.exit(exitCode);
}
