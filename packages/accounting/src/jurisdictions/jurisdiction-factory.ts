import { err, ok, type Result } from 'neverthrow';

import { UnsupportedJurisdictionError } from '../errors.js';

import type { ITaxationRules } from './base-rules.js';
import { GermanyRules } from './germany-rules.js';

/**
 * Get the taxation rules for a country code.
 */
export function getTaxationRules(jurisdiction: string): Result<ITaxationRules, Error> {
  switch (jurisdiction.trim().toUpperCase()) {
    case 'DE': {
      return ok(new GermanyRules());
    }
    default: {
      return err(new UnsupportedJurisdictionError(jurisdiction));
    }
  }
}
