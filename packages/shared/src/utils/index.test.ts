import { describe, it, expect } from 'vitest';
import { currentStation, formatOutputLine, formatResult, parseFlag, startRoute } from './index';

describe('formatResult', () => {
  it('prints numbers in decimal', () => {
    expect(formatResult(22)).toBe('22');
    expect(formatResult(0)).toBe('0');
  });

  it('prints the sentinel for a missing route', () => {
    expect(formatResult(null)).toBe('NO SUCH ROUTE');
  });
});

describe('formatOutputLine', () => {
  it('numbers lines from 1', () => {
    expect(formatOutputLine(0, 9)).toBe('Output #1: 9');
    expect(formatOutputLine(4, null)).toBe('Output #5: NO SUCH ROUTE');
  });
});

describe('route helpers', () => {
  it('starts a route at a single station with zero distance', () => {
    expect(startRoute('Alpha')).toEqual({ stops: ['Alpha'], distance: 0 });
  });

  it('reads the last stop as the current station', () => {
    expect(currentStation({ stops: ['A', 'B', 'C'], distance: 7 })).toBe('C');
  });

  it('rejects an empty route', () => {
    expect(() => currentStation({ stops: [], distance: 0 })).toThrow(
      'currentStation called on empty route',
    );
  });
});

describe('parseFlag', () => {
  it.each([
    ['1', true],
    ['true', true],
    [' YES ', true],
    ['0', false],
    ['false', false],
    ['', false],
    [undefined, false],
  ])('parses %j as %s', (value, expected) => {
    expect(parseFlag(value)).toBe(expected);
  });
});
