// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

//////////////////////////////////////////////////////////////////////////////////////

/**
 * Mean Earth radius in meters (spherical model).
 * @constant
 */
export const EARTH_RADIUS_METERS = 6_371_000;

/**
 * Multiplier for converting degrees to radians.
 * @constant
 */
export const DEG2RAD = Math.PI / 180;

/**
 * Multiplier for converting radians to degrees.
 * @constant
 */
export const RAD2DEG = 180 / Math.PI;

/** Meters in one international mile. */
export const METERS_PER_MILE = 1609.344;

/** Feet in one meter. */
export const FEET_PER_METER = 3.28084;

//////////////////////////////////////////////////////////////////////////////////////

/** J2000.0 epoch as a Unix timestamp in milliseconds. */
export const J2000_EPOCH_MS = Date.UTC(2000, 0, 1, 12, 0, 0);

export const MILLISECONDS_PER_DAY = 86_400_000;

/** Mean synodic month in days. */
export const SYNODIC_MONTH_DAYS = 29.53;

/** Known new moon used as the phase origin: 2000-01-06 18:14 UTC. */
export const REFERENCE_NEW_MOON_MS = Date.UTC(2000, 0, 6, 18, 14, 0);

//////////////////////////////////////////////////////////////////////////////////////

/** Device forward axis in the device frame (the camera looks along -z). */
export const DEVICE_FORWARD_AXIS = [0, 0, -1] as const;

/** Cardinal labels in 45 degree steps, starting at north. */
export const CARDINAL_DIRECTIONS = [
  'N',
  'NE',
  'E',
  'SE',
  'S',
  'SW',
  'W',
  'NW',
] as const;

/** Largest allowed deviation of det(R) from 1 before the orientation is reported. */
export const ORIENTATION_DETERMINANT_TOLERANCE = 0.05;
