/**
 * DISCOUNT STRATEGIES
 *
 * Open for extension, closed for modification: a new discount is a new class
 * implementing Discount, and Order never changes. Either variant can stand in
 * for the other wherever a Discount is expected.
 */

import {Discount} from '../domain';
import {percentageOff, validateDiscountPercent} from './businessLogic';
import {ValidationError} from './ValidationError';
import {Either, NonEmptyList} from 'purify-ts';

export class NoDiscount implements Discount {
    apply(total: number): number {
        return total;
    }
}

export class PercentageDiscount implements Discount {
    readonly percent: number;

    /**
     * @throws ValidationError when percent is outside [0, 100] or not finite
     */
    constructor(percent: number) {
        validateDiscountPercent(percent).ifLeft(errors => {
            throw new ValidationError(errors);
        });
        this.percent = percent;
    }

    apply(total: number): number {
        return percentageOff(total, this.percent);
    }

    static create(percent: number): Either<NonEmptyList<string>, PercentageDiscount> {
        return Either.encase(() => new PercentageDiscount(percent))
            .mapLeft(ValidationError.messagesOf);
    }
}

/**
 * Pick the strategy for a configured percentage; 0 means no discount at all.
 */
export function discountFor(percent: number): Either<NonEmptyList<string>, Discount> {
    return validateDiscountPercent(percent)
        .map<Discount>(valid => valid === 0 ? new NoDiscount() : new PercentageDiscount(valid));
}
