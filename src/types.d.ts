// Non domain types

export type PaymentLine = {
  readonly method: string;
  readonly amount: number;
};
