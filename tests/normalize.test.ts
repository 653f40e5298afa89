import { describe, expect, it } from 'vitest';
import { formatMetric, normalizeTitle, parseNumeric, toFixed1 } from '../src/utils/normalize.js';

describe('parseNumeric', () => {
  it('passes finite numbers through', () => {
    expect(parseNumeric(42)).toBe(42);
    expect(parseNumeric(-0.5)).toBe(-0.5);
  });

  it('applies magnitude suffixes', () => {
    expect(parseNumeric('1.5k')).toBe(1500);
    expect(parseNumeric('3K')).toBe(3000);
    expect(parseNumeric('2.5M')).toBe(2_500_000);
  });

  it('strips a trailing percent sign', () => {
    expect(parseNumeric('42%')).toBe(42);
    expect(parseNumeric(' 12.5 % ')).toBe(12.5);
  });

  it('parses signed decimals', () => {
    expect(parseNumeric('-3.2')).toBe(-3.2);
  });

  it('extracts the first number embedded in text', () => {
    expect(parseNumeric('approx 17.5 tps')).toBe(17.5);
    expect(parseNumeric('HPNS TPS 950')).toBe(950);
  });

  it('returns undefined for anything without a number', () => {
    expect(parseNumeric('n/a')).toBeUndefined();
    expect(parseNumeric('')).toBeUndefined();
    expect(parseNumeric(Number.NaN)).toBeUndefined();
    expect(parseNumeric(Number.POSITIVE_INFINITY)).toBeUndefined();
    expect(parseNumeric(true)).toBeUndefined();
    expect(parseNumeric(null)).toBeUndefined();
    expect(parseNumeric({ value: 3 })).toBeUndefined();
  });

  it('returns undefined when the digits overflow to infinity', () => {
    expect(parseNumeric('9'.repeat(400))).toBeUndefined();
    expect(parseNumeric(`${'9'.repeat(308)}k`)).toBeUndefined();
  });
});

describe('formatMetric', () => {
  it('renders absent values as a dash pair', () => {
    expect(formatMetric(undefined)).toBe('--');
  });

  it('abbreviates thousands', () => {
    expect(formatMetric(2500)).toBe('2.5k');
    expect(formatMetric(1000)).toBe('1.0k');
  });

  it('keeps one decimal below a thousand', () => {
    expect(formatMetric(950)).toBe('950.0');
    expect(formatMetric(72.5)).toBe('72.5');
  });

  it('rounds exact halves to even', () => {
    expect(formatMetric(72.25)).toBe('72.2');
    expect(formatMetric(72.75)).toBe('72.8');
    expect(formatMetric(2250)).toBe('2.2k');
  });
});

describe('toFixed1', () => {
  it('rounds exact binary halves to the even tenth', () => {
    expect(toFixed1(0.25)).toBe('0.2');
    expect(toFixed1(0.75)).toBe('0.8');
    expect(toFixed1(-72.25)).toBe('-72.2');
  });

  it('defers to toFixed when there is no exact tie', () => {
    expect(toFixed1(12.5)).toBe('12.5');
    expect(toFixed1(12.34)).toBe('12.3');
    expect(toFixed1(12.36)).toBe('12.4');
  });
});

describe('normalizeTitle', () => {
  it('lower-cases and trims', () => {
    expect(normalizeTitle('  TSYS Total TPS ')).toBe('tsys total tps');
  });
});
