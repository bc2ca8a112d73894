// Domain types shared across the application

export type PaymentMethod = 'credit-card' | 'paypal';

export type ProductDetails = {
  readonly name: string;
  readonly price: number;
};

/**
 * A substitutable policy turning a pre-discount total into the amount to charge.
 */
export interface Discount {
  apply(total: number): number;
}

/**
 * A sink that performs a (simulated) payment for the final amount.
 * Order only ever sees this capability, never a concrete processor.
 */
export interface PaymentProcessor {
  processPayment(amount: number): void;
}

export type OrderReceipt = {
  readonly subtotal: number;
  readonly discount: number;
  readonly total: number;
};
