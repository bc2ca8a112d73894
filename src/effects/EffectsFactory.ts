/**
 * PRODUCTION EFFECTS IMPLEMENTATION
 *
 * The real console, and the configuration read from the environment.
 */
import {ConsoleService, StoreEffects} from '../pure/effects';
import {StoreConfig} from './types';
import {errorsOf, validateDiscountPercent, validatePaymentMethod} from '../pure/businessLogic';
import {Either, Left, NonEmptyList} from 'purify-ts';

// ============================================================================
// Configuration
// ============================================================================

// Load configuration from environment variables
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Either<NonEmptyList<string>, StoreConfig> {
  const paymentMethod = validatePaymentMethod(env.STORE_PAYMENT_METHOD || 'credit-card');
  const discountPercent = validateDiscountPercent(Number(env.STORE_DISCOUNT_PERCENT || '10'));

  const errors = [...errorsOf(paymentMethod), ...errorsOf(discountPercent)];
  return NonEmptyList.isNonEmpty(errors)
    ? Left(errors)
    : paymentMethod.chain(method => discountPercent.map(percent => ({
      paymentMethod: method,
      discountPercent: percent,
    })));
}

// ============================================================================
// Console
// ============================================================================

export const consoleService: ConsoleService = {
  log(line: string): void {
    console.log(line);
  },
  error(message: string, cause?: unknown): void {
    if (cause === undefined) {
      console.error(message);
    } else {
      console.error(message, cause);
    }
  },
};

export function makeStoreEffects(): StoreEffects {
  return {
    console: consoleService,
  };
}
