/**
 * ORDER - The Coordinator
 *
 * Order holds the products and an optional discount strategy and, when asked,
 * runs the three steps of processing:
 * 1. Sum the product prices
 * 2. Apply the discount strategy, if one is set
 * 3. Hand the amount to the payment processor it was given
 *
 * It depends only on the Discount and PaymentProcessor capabilities, so any
 * variant of either can be passed in without Order changing.
 */

import {Discount, OrderReceipt, PaymentProcessor} from '../domain';
import {Product} from './product';
import {applyDiscount, calculateTotal, toOrderReceipt} from './businessLogic';
import {Maybe, Nothing} from 'purify-ts';

export class Order {
    private readonly _products: Product[] = [];
    private discountStrategy: Maybe<Discount> = Nothing;

    get products(): readonly Product[] {
        return this._products;
    }

    addProduct(product: Product): void {
        this._products.push(product);
    }

    /**
     * Replace the discount strategy. Passing nothing clears it.
     */
    setDiscountStrategy(discountStrategy?: Discount | null): void {
        this.discountStrategy = Maybe.fromNullable(discountStrategy);
    }

    /**
     * Total before any discount, recomputed from the current products.
     */
    calculateTotal(): number {
        return calculateTotal(this._products);
    }

    /**
     * Process the order with the given payment processor.
     * Order state is left untouched; each call makes one payment.
     * @return the amounts charged
     */
    processOrder(paymentProcessor: PaymentProcessor): OrderReceipt {
        const subtotal = this.calculateTotal();
        const total = applyDiscount(subtotal, this.discountStrategy);
        paymentProcessor.processPayment(total);
        return toOrderReceipt(subtotal, total);
    }
}
