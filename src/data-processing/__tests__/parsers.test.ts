import { describe, expect, it, vi } from 'vitest';
import { cellNumber, cleanHeader, parseCurrency, parseDecimal, parseNumeric, parsePercentage } from '../importers/parsers';

describe('parseDecimal', () => {
  it('parses plain and signed decimals', () => {
    expect(parseDecimal('12.5')).toBe(12.5);
    expect(parseDecimal(' 7 ')).toBe(7);
    expect(parseDecimal('.5')).toBe(0.5);
    expect(parseDecimal('-3')).toBe(-3);
    expect(parseDecimal('1e3')).toBe(1000);
  });

  it('rejects partial and non-numeric text', () => {
    expect(parseDecimal('12abc')).toBeNull();
    expect(parseDecimal('')).toBeNull();
    expect(parseDecimal('Infinity')).toBeNull();
    expect(parseDecimal('1.2.3')).toBeNull();
  });
});

describe('cleanHeader', () => {
  it('trims surrounding whitespace only', () => {
    expect(cleanHeader('  Bottle Cost ')).toBe('Bottle Cost');
  });
});

describe('parseCurrency', () => {
  it('strips dollar signs and thousands separators', () => {
    expect(parseCurrency('$12,345.67', 'test')).toBe(12345.67);
    expect(parseCurrency('  $8 ', 'test')).toBe(8);
  });

  it('treats blank cells as 0', () => {
    expect(parseCurrency('', 'test')).toBe(0);
    expect(parseCurrency(null, 'test')).toBe(0);
    expect(parseCurrency(undefined, 'test')).toBe(0);
  });

  it('passes numbers through', () => {
    expect(parseCurrency(30, 'test')).toBe(30);
  });

  it('degrades unparseable text to 0 and reports it', () => {
    const onDegrade = vi.fn();
    expect(parseCurrency('abc', 'Spirits row 1 "Cost"', onDegrade)).toBe(0);
    expect(onDegrade).toHaveBeenCalledWith('Unparseable value "abc" in Spirits row 1 "Cost", using 0', 'abc');
  });

  it('does not report blank cells', () => {
    const onDegrade = vi.fn();
    parseCurrency('   ', 'test', onDegrade);
    expect(onDegrade).not.toHaveBeenCalled();
  });
});

describe('parsePercentage', () => {
  it('converts percent text to a fraction', () => {
    expect(parsePercentage('20%', 0.2, 'test')).toBe(0.2);
    expect(parsePercentage('20', 0.2, 'test')).toBe(0.2);
    expect(parsePercentage(' 33 % ', 0.2, 'test')).toBe(0.33);
  });

  it('divides numeric cells by 100', () => {
    expect(parsePercentage(25, 0.2, 'test')).toBe(0.25);
  });

  it('uses the fallback for blank cells without reporting', () => {
    const onDegrade = vi.fn();
    expect(parsePercentage('', 0.2, 'test', onDegrade)).toBe(0.2);
    expect(onDegrade).not.toHaveBeenCalled();
  });

  it('uses the fallback for unparseable text and reports it', () => {
    const onDegrade = vi.fn();
    expect(parsePercentage('n/a', 0.2, 'test', onDegrade)).toBe(0.2);
    expect(onDegrade).toHaveBeenCalledTimes(1);
  });
});

describe('parseNumeric', () => {
  it('parses numeric text', () => {
    expect(parseNumeric('750', 1, 'test')).toBe(750);
  });

  it('falls back for blank, unparseable and non-finite values', () => {
    expect(parseNumeric('', 33.8, 'test')).toBe(33.8);
    expect(parseNumeric('big', 33.8, 'test')).toBe(33.8);
    expect(parseNumeric(Number.NaN, 1, 'test')).toBe(1);
  });

  it('does not strip currency symbols', () => {
    expect(parseNumeric('$5', 0, 'test')).toBe(0);
  });
});

describe('cellNumber', () => {
  it('reads numbers and currency-formatted text', () => {
    expect(cellNumber(5)).toBe(5);
    expect(cellNumber('$1,200')).toBe(1200);
  });

  it('reads anything else as 0', () => {
    expect(cellNumber(null)).toBe(0);
    expect(cellNumber(undefined)).toBe(0);
    expect(cellNumber('x')).toBe(0);
    expect(cellNumber(Number.POSITIVE_INFINITY)).toBe(0);
  });
});
