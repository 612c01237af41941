import { describe, expect, it } from 'vitest';
import config, { getYearRange, parseNumber } from './config';

describe('config', () => {
  it('falls back to the public vPIC endpoint and an 800px viewer', () => {
    expect(config.apiBaseUrl).toBe('https://vpic.nhtsa.dot.gov/api/vehicles');
    expect(config.pdfViewerHeight).toBe(800);
    expect(config.requestTimeoutMs).toBe(0);
  });

  it('lists years from the current one down to 1950', () => {
    const years = getYearRange(new Date(2024, 5, 1));

    expect(years).toHaveLength(75);
    expect(years[0]).toBe(2024);
    expect(years[years.length - 1]).toBe(1950);
  });

  it('parses numeric settings', () => {
    expect(parseNumber('1200', 800)).toBe(1200);
    expect(parseNumber(undefined, 800)).toBe(800);
    expect(parseNumber(' ', 800)).toBe(800);
    expect(parseNumber('tall', 800)).toBe(800);
    expect(parseNumber('-5', 800)).toBe(800);
  });
});
