// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { DistanceUnit } from './types';
import {
  CARDINAL_DIRECTIONS,
  FEET_PER_METER,
  METERS_PER_MILE,
} from './const';
import { wrap360 } from './utils/geoMath';

//////////////////////////////////////////////////////////////////////////////////////

const formatters = new Map<string, Intl.NumberFormat>();

const getFormatter = (locale: string): Intl.NumberFormat => {
  let formatter = formatters.get(locale);
  if (!formatter) {
    formatter = new Intl.NumberFormat(locale, { maximumFractionDigits: 1 });
    formatters.set(locale, formatter);
  }
  return formatter;
};

/**
 * Formats a distance for labels.
 * Metric shows whole meters under 1 km, imperial shows whole feet under 0.1 mi.
 * @param meters Distance in meters.
 * @param unit Display unit system.
 * @param locale Number formatting locale.
 */
export const formatDistance = (
  meters: number,
  unit: DistanceUnit,
  locale = 'en-US'
): string => {
  const formatter = getFormatter(locale);
  if (unit === 'mi') {
    const miles = meters / METERS_PER_MILE;
    if (miles < 0.1) {
      return `${Math.trunc(meters * FEET_PER_METER)} ft`;
    }
    return `${formatter.format(miles)} mi`;
  }
  if (meters < 1000) {
    return `${Math.trunc(meters)} m`;
  }
  return `${formatter.format(meters / 1000)} km`;
};

/**
 * Relative age of a friend's last location.
 */
export const describeLastSeen = (timestamp: Date, now: Date): string => {
  const seconds = Math.max(0, (now.getTime() - timestamp.getTime()) / 1000);
  if (seconds < 60) {
    return 'Updated just now';
  }
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) {
    return `Updated ${minutes}m ago`;
  }
  const hours = Math.floor(minutes / 60);
  if (hours < 24) {
    return `Updated ${hours}h ago`;
  }
  return `Updated ${Math.floor(hours / 24)}d ago`;
};

/**
 * Eight-point compass label for a heading.
 */
export const cardinalDirection = (headingDeg: number): string =>
  CARDINAL_DIRECTIONS[Math.trunc((wrap360(headingDeg) + 22.5) / 45) % 8];
