// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { GeoPoint } from '../types';
import { DEG2RAD, EARTH_RADIUS_METERS, RAD2DEG } from '../const';

// All public angles are degrees (0 = north, clockwise) unless the name says radians.

//////////////////////////////////////////////////////////////////////////////////////

export const toRadians = (degrees: number): number => degrees * DEG2RAD;

export const toDegrees = (radians: number): number => radians * RAD2DEG;

/**
 * Wraps an angle into [0, 360).
 */
export const wrap360 = (degrees: number): number => {
  const wrapped = degrees % 360;
  return wrapped < 0 ? wrapped + 360 : wrapped;
};

/**
 * Normalizes an angle into [-180, 180] by repeated full turns.
 * Both 180 and -180 are kept as they are.
 */
export const normalizeAngle = (degrees: number): number => {
  let normalized = degrees;
  while (normalized > 180) {
    normalized -= 360;
  }
  while (normalized < -180) {
    normalized += 360;
  }
  return normalized;
};

//////////////////////////////////////////////////////////////////////////////////////

/**
 * Initial great-circle bearing from one coordinate to another.
 * @param from Origin.
 * @param to Destination.
 * @returns Bearing in [0, 360). Identical points yield 0.
 */
export const bearing = (from: GeoPoint, to: GeoPoint): number => {
  const phi1 = from.latitude * DEG2RAD;
  const phi2 = to.latitude * DEG2RAD;
  const deltaLambda = (to.longitude - from.longitude) * DEG2RAD;

  const y = Math.sin(deltaLambda) * Math.cos(phi2);
  const x =
    Math.cos(phi1) * Math.sin(phi2) -
    Math.sin(phi1) * Math.cos(phi2) * Math.cos(deltaLambda);

  return wrap360(Math.atan2(y, x) * RAD2DEG);
};

/**
 * Great-circle distance on a spherical earth (haversine).
 * @param from Origin.
 * @param to Destination.
 * @param earthRadiusMeters Sphere radius.
 * @returns Distance in meters.
 */
export const distance = (
  from: GeoPoint,
  to: GeoPoint,
  earthRadiusMeters: number = EARTH_RADIUS_METERS
): number => {
  const phi1 = from.latitude * DEG2RAD;
  const phi2 = to.latitude * DEG2RAD;
  const deltaPhi = phi2 - phi1;
  const deltaLambda = (to.longitude - from.longitude) * DEG2RAD;

  const sinHalfPhi = Math.sin(deltaPhi / 2);
  const sinHalfLambda = Math.sin(deltaLambda / 2);
  const a = Math.min(
    1,
    sinHalfPhi * sinHalfPhi +
      Math.cos(phi1) * Math.cos(phi2) * sinHalfLambda * sinHalfLambda
  );
  return 2 * earthRadiusMeters * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
};

/**
 * Angle from the device heading to a target bearing.
 * @returns Degrees in [-180, 180]; positive means the target is to the right.
 */
export const relativeBearing = (
  targetBearingDeg: number,
  deviceHeadingDeg: number
): number => normalizeAngle(targetBearingDeg - deviceHeadingDeg);

/**
 * Tests whether a bearing falls inside a horizontal field of view centred on the heading.
 * The edge itself counts as inside.
 */
export const isWithinHorizontalFOV = (
  bearingDeg: number,
  deviceHeadingDeg: number,
  fieldOfViewDeg: number
): boolean =>
  Math.abs(relativeBearing(bearingDeg, deviceHeadingDeg)) <=
  fieldOfViewDeg / 2;

//////////////////////////////////////////////////////////////////////////////////////

/**
 * Elevation of the straight chord through a spherical earth toward a point at the given
 * great-circle distance. Half the central angle below the horizontal, saturating at -π/2.
 * @param distanceMeters Great-circle distance.
 * @param earthRadiusMeters Sphere radius.
 * @returns Radians in [-π/2, 0].
 */
export const trueElevationAngle = (
  distanceMeters: number,
  earthRadiusMeters: number = EARTH_RADIUS_METERS
): number => {
  const centralAngle = distanceMeters / earthRadiusMeters;
  if (centralAngle <= 0) {
    return 0;
  }
  return -Math.min(centralAngle / 2, Math.PI / 2);
};

/**
 * Display-compressed elevation, linear in distance up to `maxDistanceMeters`.
 * @returns Radians in [-maxAngleDegrees, 0] (as radians).
 */
export const scaledElevationAngle = (
  distanceMeters: number,
  maxDistanceMeters = 20_000_000,
  maxAngleDegrees = 20
): number => {
  const normalized = Math.min(distanceMeters / maxDistanceMeters, 1);
  return -normalized * maxAngleDegrees * DEG2RAD;
};
