/**
 * Field Normalizer Tests
 */

import { describe, it, expect } from 'vitest';
import {
  normalizeDate,
  normalizeFlag,
  normalizeOccupationFields,
  normalizeSkaFields,
  normalizeSpace,
} from '../../../transformation/field-normalizer.js';
import { rawSkaRecord } from '../../utils/fixtures.js';

describe('normalizeSpace', () => {
  it('trims and collapses internal whitespace', () => {
    expect(normalizeSpace('  Chief \t Executives \n')).toBe('Chief Executives');
  });

  it('maps missing input to the empty string', () => {
    expect(normalizeSpace(null)).toBe('');
    expect(normalizeSpace(undefined)).toBe('');
  });
});

describe('normalizeFlag', () => {
  it.each(['Y', 'y', 'T', 'true', 'TRUE', '1', ' y '])('maps %j to Y', (value) => {
    expect(normalizeFlag(value)).toBe('Y');
  });

  it.each(['N', 'n', 'F', 'false', '0'])('maps %j to N', (value) => {
    expect(normalizeFlag(value)).toBe('N');
  });

  it.each([null, undefined, '', 'maybe', 'unavailable', 'YES'])('maps %j to unavailable', (value) => {
    expect(normalizeFlag(value)).toBe('unavailable');
  });
});

describe('normalizeDate', () => {
  it('keeps ISO dates', () => {
    expect(normalizeDate('2023-07-01')).toBe('2023-07-01');
  });

  it('converts month/day/year', () => {
    expect(normalizeDate('07/01/2023')).toBe('2023-07-01');
    expect(normalizeDate('7/1/2023')).toBe('2023-07-01');
  });

  it('converts year/month/day', () => {
    expect(normalizeDate('2021/12/5')).toBe('2021-12-05');
  });

  it('keeps two-digit years literal', () => {
    expect(normalizeDate('0099-12-31')).toBe('0099-12-31');
    expect(normalizeDate('02/29/0004')).toBe('0004-02-29');
  });

  it('rejects impossible calendar dates', () => {
    expect(normalizeDate('2023-02-30')).toBe('unavailable');
    expect(normalizeDate('13/01/2023')).toBe('unavailable');
  });

  it('rejects unrecognized and missing input', () => {
    expect(normalizeDate('July 2023')).toBe('unavailable');
    expect(normalizeDate('')).toBe('unavailable');
    expect(normalizeDate(null)).toBe('unavailable');
  });
});

describe('normalizeSkaFields', () => {
  it('trims keys and upper-cases the scale id', () => {
    const fields = normalizeSkaFields(
      rawSkaRecord({ onetsoc_code: ' 11-1011.00 ', element_id: '2.A.1.a ', scale_id: ' im' })
    );

    expect(fields.onetsoc_code).toBe('11-1011.00');
    expect(fields.element_id).toBe('2.A.1.a');
    expect(fields.scale_id).toBe('IM');
  });

  it('substitutes the sentinel for missing metadata', () => {
    const fields = normalizeSkaFields(
      rawSkaRecord({
        recommend_suppress: null,
        not_relevant: '',
        date_updated: null,
        domain_source: '   ',
      })
    );

    expect(fields.recommend_suppress).toBe('unavailable');
    expect(fields.not_relevant).toBe('unavailable');
    expect(fields.date_updated).toBe('unavailable');
    expect(fields.domain_source).toBe('unavailable');
  });

  it('leaves numeric columns as trimmed text', () => {
    const fields = normalizeSkaFields(rawSkaRecord({ data_value: ' 4.5 ', n: null }));

    expect(fields.data_value).toBe('4.5');
    expect(fields.n).toBe('');
  });

  it('does not mutate the input record', () => {
    const record = rawSkaRecord({ scale_id: 'lv' });
    normalizeSkaFields(record);
    expect(record.scale_id).toBe('lv');
  });
});

describe('normalizeOccupationFields', () => {
  it('uses the sentinel for a missing description', () => {
    expect(
      normalizeOccupationFields({ onetsoc_code: '11-1011.00', title: ' Chief Executives ', description: null })
    ).toEqual({
      onetsoc_code: '11-1011.00',
      title: 'Chief Executives',
      description: 'unavailable',
    });
  });
});
