// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import { describe, expect, it } from 'vitest';

import { isDaytimeWithFallback } from '../../src/astro/daylight';
import { DEFAULT_RADAR_OPTIONS } from '../../src/default';

const utc = (hour: number, minute = 0, day = 1) =>
  new Date(Date.UTC(2024, 5, day, hour, minute));

describe('isDaytimeWithFallback', () => {
  it('uses the fixed day window without an observer', () => {
    const at = (hour: number, minute = 0) =>
      isDaytimeWithFallback(utc(hour, minute), null, DEFAULT_RADAR_OPTIONS, 0);
    expect(at(5, 59)).toBe(false);
    expect(at(6)).toBe(true);
    expect(at(19, 59)).toBe(true);
    expect(at(20)).toBe(false);
  });

  it('applies the caller UTC offset', () => {
    // 22:00 UTC is 07:00 at UTC+9
    expect(
      isDaytimeWithFallback(utc(22), null, DEFAULT_RADAR_OPTIONS, 540)
    ).toBe(true);
    // 00:30 UTC is 19:30 the day before at UTC-5, 01:00 UTC is 20:00
    expect(
      isDaytimeWithFallback(utc(0, 30, 2), null, DEFAULT_RADAR_OPTIONS, -300)
    ).toBe(true);
    expect(
      isDaytimeWithFallback(utc(1, 0, 2), null, DEFAULT_RADAR_OPTIONS, -300)
    ).toBe(false);
  });

  it('honours a custom day window', () => {
    const options = {
      ...DEFAULT_RADAR_OPTIONS,
      fallbackDayStartHour: 8,
      fallbackDayEndHour: 18,
    };
    expect(isDaytimeWithFallback(utc(7), null, options, 0)).toBe(false);
    expect(isDaytimeWithFallback(utc(17, 30), null, options, 0)).toBe(true);
  });

  it('prefers the solar rule when the observer is known', () => {
    // Sun far below the horizon at the equator at 00:00 UTC, even though the
    // fallback window at UTC+12 would call it day.
    const equator = { latitude: 0, longitude: 0 };
    expect(
      isDaytimeWithFallback(utc(0), equator, DEFAULT_RADAR_OPTIONS, 720)
    ).toBe(false);
    expect(
      isDaytimeWithFallback(utc(12), equator, DEFAULT_RADAR_OPTIONS, 720)
    ).toBe(true);
  });
});
