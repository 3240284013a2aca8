// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { HorizontalPosition } from '../types';
import { DEG2RAD } from '../const';
import {
  eclipticToEquatorial,
  equatorialToHorizontal,
  julianDaysSinceJ2000,
  obliquityOfEcliptic,
} from './ephemeris';

//////////////////////////////////////////////////////////////////////////////////////

/** Civil twilight: the sun is below the horizon but the sky is still lit. */
export const CIVIL_TWILIGHT_ELEVATION_DEG = -6;

/**
 * Computes the sun's azimuth and elevation.
 * Low-precision approximation (arc-minute scale), adequate for visual placement.
 * @param instant Instant of observation.
 * @param latitude Observer latitude in degrees.
 * @param longitude Observer longitude in degrees.
 * @returns Azimuth (0 = north, clockwise) and elevation in degrees.
 */
export const sunPosition = (
  instant: Date,
  latitude: number,
  longitude: number
): HorizontalPosition => {
  const n = julianDaysSinceJ2000(instant);

  const meanLongitude = (280.46 + 0.9856474 * n) % 360;
  const meanAnomaly = ((357.528 + 0.9856003 * n) % 360) * DEG2RAD;
  const eclipticLongitude =
    meanLongitude +
    1.915 * Math.sin(meanAnomaly) +
    0.02 * Math.sin(2 * meanAnomaly);

  const equatorial = eclipticToEquatorial(
    eclipticLongitude * DEG2RAD,
    0,
    obliquityOfEcliptic(n)
  );
  return equatorialToHorizontal(equatorial, n, instant, latitude, longitude);
};

/**
 * Sun elevation in degrees above the horizon.
 */
export const sunElevation = (
  instant: Date,
  latitude: number,
  longitude: number
): number => sunPosition(instant, latitude, longitude).elevationDeg;

/**
 * Whether the sun is above the twilight threshold.
 * @param thresholdDeg Elevation cutoff, civil twilight by default.
 */
export const isDaytime = (
  instant: Date,
  latitude: number,
  longitude: number,
  thresholdDeg: number = CIVIL_TWILIGHT_ELEVATION_DEG
): boolean => sunElevation(instant, latitude, longitude) > thresholdDeg;
