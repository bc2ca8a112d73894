/**
 * PURE BUSINESS LOGIC
 *
 * Everything the store computes lives here as functions from values to
 * values. The classes in this directory delegate to these, so the arithmetic
 * is tested once with plain inputs and outputs.
 *
 * Note that currency and decimal precision are not modelled: amounts are
 * plain numbers and print with six significant digits.
 */

import {Discount, PaymentMethod, ProductDetails, OrderReceipt} from '../domain';
import {PaymentLine} from "../types";
import {Either, Left, Maybe, NonEmptyList, Right} from "purify-ts";

// ============================================================================
// Validation
// ============================================================================

function collect<T>(errors: string[], value: T): Either<NonEmptyList<string>, T> {
  return NonEmptyList.isNonEmpty(errors) ? Left(errors) : Right(value);
}

export function errorsOf<T>(result: Either<NonEmptyList<string>, T>): string[] {
  return result.caseOf<string[]>({
    Left: errors => [...errors],
    Right: () => [],
  });
}

export function validateProductDetails(
  name: string,
  price: number
): Either<NonEmptyList<string>, ProductDetails> {
  const errors: string[] = [];
  if (name.trim().length === 0) {
    errors.push('Product name must not be empty');
  }
  if (!Number.isFinite(price)) {
    errors.push(`Product price must be a finite number: ${price}`);
  } else if (price < 0) {
    errors.push(`Product price must not be negative: ${price}`);
  }
  return collect(errors, {name, price});
}

export function validateDiscountPercent(
  percent: number
): Either<NonEmptyList<string>, number> {
  const errors: string[] = [];
  if (!Number.isFinite(percent)) {
    errors.push(`Discount percent must be a finite number: ${percent}`);
  } else if (percent < 0 || percent > 100) {
    errors.push(`Discount percent must be between 0 and 100: ${percent}`);
  }
  return collect(errors, percent);
}

const paymentMethods: readonly PaymentMethod[] = ['credit-card', 'paypal'];

export function validatePaymentMethod(
  method: string
): Either<NonEmptyList<string>, PaymentMethod> {
  const match = paymentMethods.find(known => known === method);
  return match
    ? Right(match)
    : Left(NonEmptyList([`Unknown payment method: ${method} (expected one of ${paymentMethods.join(', ')})`]));
}

// ============================================================================
// Core Calculations
// ============================================================================

export function calculateTotal(products: readonly ProductDetails[]): number {
  return products.reduce((sum, product) => sum + product.price, 0);
}

export function percentageOff(total: number, percent: number): number {
  return total - (total * percent / 100);
}

export function applyDiscount(total: number, discount: Maybe<Discount>): number {
  return discount.mapOrDefault(strategy => strategy.apply(total), total);
}

export function toOrderReceipt(subtotal: number, total: number): OrderReceipt {
  return {
    subtotal,
    discount: subtotal - total,
    total,
  };
}

// ============================================================================
// Output
// ============================================================================

const paymentLabels: Record<PaymentMethod, string> = {
  'credit-card': 'credit card',
  paypal: 'PayPal',
};

// Six significant digits, then trailing zeros dropped: 0.1 + 0.2 prints as 0.3
export function formatAmount(amount: number): string {
  return String(Number(amount.toPrecision(6)));
}

export function toPaymentLine(method: PaymentMethod, amount: number): PaymentLine {
  return {method: paymentLabels[method], amount};
}

export function buildPaymentMessage(line: PaymentLine): string {
  return `Processing ${line.method} payment of $${formatAmount(line.amount)}`;
}
