import { describe, it, expect } from 'vitest';
import {
  COMPASS_POINTS,
  compassDirection,
  formatHourLabel,
  iconFor,
} from '../../core/display/formatters.js';

function localUnixSeconds(hours: number, minutes: number): number {
  return Math.floor(new Date(2026, 0, 15, hours, minutes, 0).getTime() / 1000);
}

describe('iconFor', () => {
  it.each([
    [199, 'unknown'],
    [200, 'storm'],
    [232, 'storm'],
    [233, 'unknown'],
    [300, 'drizzle'],
    [321, 'drizzle'],
    [500, 'rain'],
    [531, 'rain'],
    [600, 'snow'],
    [622, 'snow'],
    [700, 'unknown'],
    [701, 'haze/mist'],
    [771, 'haze/mist'],
    [781, 'tornado'],
    [782, 'unknown'],
    [800, 'clear'],
    [801, 'partly-cloudy'],
    [802, 'cloudy'],
    [804, 'cloudy'],
    [805, 'unknown'],
  ])('maps %i to %s', (code, icon) => {
    expect(iconFor(code)).toBe(icon);
  });

  it('returns a non-empty name for every code from 0 to 1000', () => {
    for (let code = 0; code <= 1000; code++) {
      expect(iconFor(code).length).toBeGreaterThan(0);
    }
  });

  it('treats negative codes as unknown', () => {
    expect(iconFor(-1)).toBe('unknown');
  });
});

describe('compassDirection', () => {
  it('returns the cardinal points', () => {
    expect(compassDirection(0)).toBe('N');
    expect(compassDirection(90)).toBe('E');
    expect(compassDirection(180)).toBe('S');
    expect(compassDirection(270)).toBe('W');
  });

  it('wraps the top of the range back to N', () => {
    expect(compassDirection(359)).toBe('N');
    expect(compassDirection(348.75)).toBe('N');
    expect(compassDirection(348.74)).toBe('NNW');
  });

  it('switches bucket at the half-sector boundary', () => {
    expect(compassDirection(11.24)).toBe('N');
    expect(compassDirection(11.25)).toBe('NNE');
    expect(compassDirection(250)).toBe('WSW');
  });

  it('returns one of the 16 labels for every bearing in [0, 360)', () => {
    for (let degrees = 0; degrees < 360; degrees++) {
      expect(COMPASS_POINTS).toContain(compassDirection(degrees));
    }
  });

  it('wraps out-of-range bearings', () => {
    expect(compassDirection(370)).toBe('N');
    expect(compassDirection(450)).toBe('E');
    expect(compassDirection(-20)).toBe('NNW');
    expect(compassDirection(-90)).toBe('W');
  });

  it('returns N for non-finite input', () => {
    expect(compassDirection(Number.NaN)).toBe('N');
    expect(compassDirection(Number.POSITIVE_INFINITY)).toBe('N');
  });
});

describe('formatHourLabel', () => {
  it('formats local midnight as 00:00', () => {
    expect(formatHourLabel(localUnixSeconds(0, 0))).toBe('00:00');
  });

  it('formats local noon as 12:00', () => {
    expect(formatHourLabel(localUnixSeconds(12, 0))).toBe('12:00');
  });

  it('zero-pads hours and minutes', () => {
    expect(formatHourLabel(localUnixSeconds(9, 5))).toBe('09:05');
    expect(formatHourLabel(localUnixSeconds(23, 59))).toBe('23:59');
  });
});
