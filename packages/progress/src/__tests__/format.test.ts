import { describe, expect, it } from 'vitest';

import {
  formatCount,
  humanize,
  isTimeUnit,
  niceSpeedUnit,
  niceTimeUnit,
  prettyPrintDuration,
  scale,
} from '../format.js';

describe('prettyPrintDuration', () => {
  it.each([
    [0, '0ms'],
    [999, '999ms'],
    [999.9, '999ms'],
    [1000, '1s'],
    [61_000, '1m 1s'],
    [3_600_000, '1h 0s'],
    [90_061_000, '1d 1h 1m 1s'],
  ])('formats %d ms as %s', (ms, expected) => {
    expect(prettyPrintDuration(ms)).toBe(expected);
  });

  it('clamps negative durations to zero', () => {
    expect(prettyPrintDuration(-5)).toBe('0ms');
  });
});

describe('scale', () => {
  it('divides by 1000 until below 1000', () => {
    expect(scale(999)).toEqual([999, '']);
    expect(scale(300_000)).toEqual([300, 'k']);
    expect(scale(2_000_000_000)).toEqual([2, 'G']);
  });
});

describe('humanize', () => {
  it('keeps two decimals and a prefix', () => {
    expect(humanize(0)).toBe('0.00');
    expect(humanize(1000)).toBe('1.00k');
    expect(humanize(1_234_567_890)).toBe('1.23G');
  });
});

describe('nice units', () => {
  it('picks the largest unit not longer than the time per item', () => {
    expect(niceTimeUnit(2 * 86_400)).toBe('d');
    expect(niceTimeUnit(120)).toBe('m');
    expect(niceTimeUnit(1)).toBe('s');
    expect(niceTimeUnit(0.5)).toBe('ms');
    expect(niceTimeUnit(5e-6)).toBe('μs');
    expect(niceTimeUnit(1e-10)).toBe('ns');
  });

  it('picks the smallest unit of a second or more not shorter than the time per item', () => {
    expect(niceSpeedUnit(0.5)).toBe('s');
    expect(niceSpeedUnit(1)).toBe('s');
    expect(niceSpeedUnit(2)).toBe('m');
    expect(niceSpeedUnit(100)).toBe('h');
    expect(niceSpeedUnit(1e6)).toBe('d');
  });

  it('recognizes time unit names', () => {
    expect(isTimeUnit('μs')).toBe(true);
    expect(isTimeUnit('us')).toBe(false);
  });
});

describe('formatCount', () => {
  it('groups thousands on request', () => {
    expect(formatCount(1_234_567, true)).toBe('1,234,567');
    expect(formatCount(1_234_567, false)).toBe('1234567');
  });
});
