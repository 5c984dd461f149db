import { describe, expect, it } from 'vitest';

import { parseEnv, toTaxationDefaults } from '../config.js';

describe('parseEnv', () => {
  it('should leave every taxation setting undefined when nothing is set', () => {
    const defaults = toTaxationDefaults(parseEnv({}));

    expect(defaults).toEqual({
      allAirdropsAreGifts: undefined,
      fiatCurrency: undefined,
      jurisdiction: undefined,
      method: undefined,
      multiDepot: undefined,
      taxYear: undefined,
    });
  });

  it('should map COINRECKON variables onto taxation settings', () => {
    const defaults = toTaxationDefaults(
      parseEnv({
        COINRECKON_ALL_AIRDROPS_ARE_GIFTS: 'true',
        COINRECKON_COUNTRY: 'de',
        COINRECKON_FIAT: 'eur',
        COINRECKON_MULTI_DEPOT: 'false',
        COINRECKON_PRINCIPLE: 'LIFO',
        COINRECKON_TAX_YEAR: '2024',
      })
    );

    expect(defaults).toEqual({
      allAirdropsAreGifts: true,
      fiatCurrency: 'EUR',
      jurisdiction: 'DE',
      method: 'lifo',
      multiDepot: false,
      taxYear: 2024,
    });
  });

  it('should list every invalid variable', () => {
    expect(() => parseEnv({ COINRECKON_TAX_YEAR: '24', COINRECKON_PRINCIPLE: 'hifo' })).toThrow(
      /COINRECKON_PRINCIPLE[\s\S]*COINRECKON_TAX_YEAR|COINRECKON_TAX_YEAR[\s\S]*COINRECKON_PRINCIPLE/
    );
  });
});
