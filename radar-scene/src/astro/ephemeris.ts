// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { HorizontalPosition } from '../types';
import {
  DEG2RAD,
  J2000_EPOCH_MS,
  MILLISECONDS_PER_DAY,
  RAD2DEG,
} from '../const';

// Low-precision pipeline shared by the sun and the moon:
// mean elements -> ecliptic -> equatorial -> horizontal.

//////////////////////////////////////////////////////////////////////////////////////

export interface EquatorialPosition {
  /** Right ascension in radians. */
  readonly rightAscension: number;
  /** Declination in radians. */
  readonly declination: number;
}

//////////////////////////////////////////////////////////////////////////////////////

/**
 * Days elapsed since J2000.0 (UTC is used in place of TT).
 */
export const julianDaysSinceJ2000 = (instant: Date): number =>
  (instant.getTime() - J2000_EPOCH_MS) / MILLISECONDS_PER_DAY;

/**
 * UTC hour of day with minutes and whole seconds as fraction.
 */
export const utcHourOfDay = (instant: Date): number =>
  instant.getUTCHours() +
  instant.getUTCMinutes() / 60 +
  instant.getUTCSeconds() / 3600;

/**
 * Obliquity of the ecliptic in radians.
 * @param n Days since J2000.0.
 */
export const obliquityOfEcliptic = (n: number): number =>
  (23.439 - 0.0000004 * n) * DEG2RAD;

/**
 * Local mean sidereal time, linear approximation without nutation.
 * @param n Days since J2000.0.
 * @param utcHour UTC hour of day.
 * @param longitude Observer longitude in degrees, east positive.
 * @returns Sidereal time in hours (not wrapped after the longitude shift).
 */
export const localMeanSiderealHours = (
  n: number,
  utcHour: number,
  longitude: number
): number => {
  const gmst = (6.697375 + 0.0657098242 * n + utcHour) % 24;
  return gmst + longitude / 15;
};

/**
 * Converts ecliptic coordinates into equatorial coordinates.
 * @param eclipticLongitude Radians.
 * @param eclipticLatitude Radians.
 * @param obliquity Radians.
 */
export const eclipticToEquatorial = (
  eclipticLongitude: number,
  eclipticLatitude: number,
  obliquity: number
): EquatorialPosition => {
  const sinDeclination =
    Math.sin(eclipticLatitude) * Math.cos(obliquity) +
    Math.cos(eclipticLatitude) *
      Math.sin(obliquity) *
      Math.sin(eclipticLongitude);
  const rightAscension = Math.atan2(
    Math.sin(eclipticLongitude) * Math.cos(obliquity) -
      Math.tan(eclipticLatitude) * Math.sin(obliquity),
    Math.cos(eclipticLongitude)
  );
  return {
    rightAscension,
    declination: Math.asin(sinDeclination),
  };
};

/**
 * Standard equatorial-to-horizontal transform for an observer.
 * @param equatorial Body position.
 * @param n Days since J2000.0.
 * @param instant Instant of observation.
 * @param latitude Observer latitude in degrees.
 * @param longitude Observer longitude in degrees.
 * @returns Azimuth (0 = north, clockwise) and elevation in degrees.
 */
export const equatorialToHorizontal = (
  equatorial: EquatorialPosition,
  n: number,
  instant: Date,
  latitude: number,
  longitude: number
): HorizontalPosition => {
  const { rightAscension, declination } = equatorial;
  const lmst = localMeanSiderealHours(n, utcHourOfDay(instant), longitude);
  const hourAngle = lmst * 15 * DEG2RAD - rightAscension;
  const phi = latitude * DEG2RAD;

  const sinElevation =
    Math.sin(phi) * Math.sin(declination) +
    Math.cos(phi) * Math.cos(declination) * Math.cos(hourAngle);
  const elevation = Math.asin(sinElevation);

  const cosAzimuth =
    (Math.sin(declination) - Math.sin(phi) * sinElevation) /
    (Math.cos(phi) * Math.cos(elevation));
  let azimuthDeg = Math.acos(Math.max(-1, Math.min(1, cosAzimuth))) * RAD2DEG;
  if (Math.sin(hourAngle) > 0) {
    azimuthDeg = 360 - azimuthDeg;
  }

  return {
    azimuthDeg,
    elevationDeg: elevation * RAD2DEG,
  };
};
