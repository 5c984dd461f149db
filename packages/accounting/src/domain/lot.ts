import type { Decimal } from 'decimal.js';

import type { AcquisitionOperation } from './schemas.js';

/**
 * Acquisition record held by a lot queue. `remaining` shrinks as disposals
 * consume it; the lot leaves its queue once nothing remains.
 */
export interface Lot {
  readonly source: AcquisitionOperation;
  remaining: Decimal;
}

/**
 * The part of a lot matched against one disposal.
 */
export interface ConsumedLot {
  readonly source: AcquisitionOperation;
  readonly amount: Decimal;
}

/**
 * A consumed lot traced back to its original acquisition, with the share of
 * transfer fees paid on the way (in the consumed coin).
 */
export interface TracedLot {
  readonly consumed: ConsumedLot;
  readonly transferFee: Decimal;
}
