// ============================================================================
// Configuration
// ============================================================================

import {PaymentMethod} from "../domain";

export type StoreConfig = {
    readonly paymentMethod: PaymentMethod;
    readonly discountPercent: number;
}
