/**
 * PAYMENT PROCESSORS
 *
 * Simulated payments: each processor writes a single line describing the
 * charge. Order depends on the PaymentProcessor interface and never on
 * these classes.
 */
import {PaymentMethod, PaymentProcessor} from '../domain';
import {ConsoleService} from '../pure/effects';
import {buildPaymentMessage, toPaymentLine} from '../pure/businessLogic';
import {consoleService} from './EffectsFactory';

abstract class ConsolePaymentProcessor implements PaymentProcessor {
  protected abstract readonly method: PaymentMethod;

  constructor(private readonly output: ConsoleService = consoleService) {}

  processPayment(amount: number): void {
    this.output.log(buildPaymentMessage(toPaymentLine(this.method, amount)));
  }
}

export class CreditCardProcessor extends ConsolePaymentProcessor {
  protected readonly method: PaymentMethod = 'credit-card';
}

export class PayPalProcessor extends ConsolePaymentProcessor {
  protected readonly method: PaymentMethod = 'paypal';
}

const paymentProcessors: Record<PaymentMethod, (output: ConsoleService) => PaymentProcessor> = {
  'credit-card': (output) => new CreditCardProcessor(output),
  paypal: (output) => new PayPalProcessor(output),
};

export function makePaymentProcessor(
  method: PaymentMethod,
  output: ConsoleService = consoleService
): PaymentProcessor {
  return paymentProcessors[method](output);
}
