// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import { describe, expect, it } from 'vitest';

import {
  CIVIL_TWILIGHT_ELEVATION_DEG,
  isDaytime,
  sunElevation,
  sunPosition,
} from '../../src/astro/solarPosition';
import {
  julianDaysSinceJ2000,
  utcHourOfDay,
} from '../../src/astro/ephemeris';

const NEW_YORK = { latitude: 40.7128, longitude: -74.006 };
const LONDON = { latitude: 51.5074, longitude: -0.1278 };

describe('ephemeris time helpers', () => {
  it('counts days from J2000.0', () => {
    expect(julianDaysSinceJ2000(new Date(Date.UTC(2000, 0, 1, 12)))).toBe(0);
    expect(julianDaysSinceJ2000(new Date(Date.UTC(2000, 0, 2, 0)))).toBe(0.5);
  });

  it('returns the fractional UTC hour', () => {
    expect(utcHourOfDay(new Date(Date.UTC(2024, 5, 1, 13, 30, 0)))).toBe(
      13.5
    );
  });
});

describe('sunPosition', () => {
  it('stands near the zenith at the equinox noon on the equator', () => {
    const position = sunPosition(new Date(Date.UTC(2024, 2, 20, 12)), 0, 0);
    expect(position.elevationDeg).toBeCloseTo(88.164, 2);
    expect(position.azimuthDeg).toBeCloseTo(85.373, 2);
  });

  it('is far below the horizon at the equinox midnight on the equator', () => {
    const position = sunPosition(new Date(Date.UTC(2024, 2, 20, 0)), 0, 0);
    expect(position.elevationDeg).toBeCloseTo(-88.132, 2);
  });

  it('culminates due south over New York at solar noon', () => {
    const position = sunPosition(
      new Date(Date.UTC(2024, 5, 21, 17)),
      NEW_YORK.latitude,
      NEW_YORK.longitude
    );
    expect(position.elevationDeg).toBeCloseTo(72.715, 2);
    expect(position.azimuthDeg).toBeCloseTo(181.547, 2);
  });

  it('reports the morning sun in the south-east', () => {
    const position = sunPosition(
      new Date(Date.UTC(2024, 5, 21, 16)),
      NEW_YORK.latitude,
      NEW_YORK.longitude
    );
    expect(position.azimuthDeg).toBeCloseTo(140.435, 2);
    expect(position.elevationDeg).toBeCloseTo(68.864, 2);
  });

  it('matches sunElevation', () => {
    const instant = new Date(Date.UTC(2024, 11, 21, 23));
    expect(sunElevation(instant, LONDON.latitude, LONDON.longitude)).toBe(
      sunPosition(instant, LONDON.latitude, LONDON.longitude).elevationDeg
    );
  });
});

describe('isDaytime', () => {
  it('uses civil twilight as the default cutoff', () => {
    expect(CIVIL_TWILIGHT_ELEVATION_DEG).toBe(-6);
    // London winter solstice: -9.2° at 07:00, -5.2° at 07:30, -1.3° at 08:00
    const at = (hour: number, minute = 0) =>
      isDaytime(
        new Date(Date.UTC(2024, 11, 21, hour, minute)),
        LONDON.latitude,
        LONDON.longitude
      );
    expect(at(7)).toBe(false);
    expect(at(7, 30)).toBe(true);
    expect(at(8)).toBe(true);
    expect(at(23)).toBe(false);
  });

  it('honours a custom threshold', () => {
    const instant = new Date(Date.UTC(2024, 11, 21, 7, 30));
    expect(isDaytime(instant, LONDON.latitude, LONDON.longitude, 0)).toBe(
      false
    );
  });
});
