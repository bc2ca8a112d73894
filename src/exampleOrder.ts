/**
 * EXAMPLE ORDER
 *
 * Composes one run of the store: two products, the configured discount and
 * the configured payment processor. This is the only place that names
 * concrete strategies; everything below it works against the interfaces.
 */
import {OrderReceipt} from './domain';
import {StoreEffects} from './pure/effects';
import {StoreConfig} from './effects/types';
import {Order} from './pure/orderProcessing';
import {Product} from './pure/product';
import {discountFor} from './pure/discounts';
import {makePaymentProcessor} from './effects/paymentProcessors';
import {loadConfigFromEnv} from './effects/EffectsFactory';
import {ValidationError} from './pure/ValidationError';

export const exampleProducts: ReadonlyArray<readonly [string, number]> = [
    ['Laptop', 1000],
    ['Phone', 500],
];

/**
 * @throws ValidationError if the configured discount is out of range
 */
export function runExampleOrder(
    config: StoreConfig
): (storeEffects: StoreEffects) => OrderReceipt {
    return (storeEffects: StoreEffects) => {
        const order = new Order();
        exampleProducts.forEach(([name, price]) => order.addProduct(new Product(name, price)));

        order.setDiscountStrategy(discountFor(config.discountPercent).caseOf({
            Left: (errors) => {
                throw new ValidationError(errors);
            },
            Right: (strategy) => strategy,
        }));

        return order.processOrder(makePaymentProcessor(config.paymentMethod, storeEffects.console));
    };
}

/**
 * Load the configuration from the environment and run the example order.
 * Every failure is reported through the store console.
 * @return the process exit code
 */
export function runFromEnv(
    env: NodeJS.ProcessEnv
): (storeEffects: StoreEffects) => number {
    return (storeEffects: StoreEffects) => {
        try {
            return loadConfigFromEnv(env).caseOf({
                Left: (errors) => {
                    storeEffects.console.error(`❌ Invalid configuration: ${errors.join('; ')}`);
                    return 1;
                },
                Right: (config) => {
                    runExampleOrder(config)(storeEffects);
                    return 0;
                },
            });
        } catch (error) {
            storeEffects.console.error('💥 Unhandled error:', error);
            return 1;
        }
    };
}
