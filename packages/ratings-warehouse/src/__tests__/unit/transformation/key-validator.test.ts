/**
 * Key Validator Tests
 */

import { describe, it, expect } from 'vitest';
import { isValidSocCode, validateKeys } from '../../../transformation/key-validator.js';
import { makeRegistries } from '../../utils/fixtures.js';

describe('isValidSocCode', () => {
  it.each(['11-1011.00', '29-1141.01'])('accepts %s', (code) => {
    expect(isValidSocCode(code)).toBe(true);
  });

  it.each(['bad-code', '11-1011', '111011.00', '11-1011.0', 'AB-1011.00', ''])('rejects %j', (code) => {
    expect(isValidSocCode(code)).toBe(false);
  });
});

describe('validateKeys', () => {
  const registries = makeRegistries();

  it('accepts a known element and supported scale', () => {
    expect(
      validateKeys({ onetsoc_code: '11-1011.00', element_id: '2.A.1.a', scale_id: 'LV' }, registries)
    ).toEqual({ valid: true });
  });

  it('reports an unknown element as missing_element_id', () => {
    expect(
      validateKeys({ onetsoc_code: '11-1011.00', element_id: '9.Z.9', scale_id: 'IM' }, registries)
    ).toEqual({ valid: false, reason: 'missing_element_id' });
  });

  it('reports an empty element as missing_element_id', () => {
    expect(
      validateKeys({ onetsoc_code: '11-1011.00', element_id: '', scale_id: 'IM' }, registries)
    ).toEqual({ valid: false, reason: 'missing_element_id' });
  });

  it('reports an unsupported scale', () => {
    expect(
      validateKeys({ onetsoc_code: '11-1011.00', element_id: '2.A.1.a', scale_id: 'EX' }, registries)
    ).toEqual({ valid: false, reason: 'invalid_scale_id' });
  });

  it('checks SOC format before element and scale', () => {
    expect(
      validateKeys({ onetsoc_code: 'bad-code', element_id: '', scale_id: 'XX' }, registries)
    ).toEqual({ valid: false, reason: 'invalid_soc_format' });
  });

  it('checks element before scale', () => {
    expect(
      validateKeys({ onetsoc_code: '11-1011.00', element_id: 'nope', scale_id: 'XX' }, registries)
    ).toEqual({ valid: false, reason: 'missing_element_id' });
  });
});
