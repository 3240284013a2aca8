// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { HorizontalPosition, MoonPhaseId } from '../types';
import {
  DEG2RAD,
  MILLISECONDS_PER_DAY,
  REFERENCE_NEW_MOON_MS,
  SYNODIC_MONTH_DAYS,
} from '../const';
import {
  eclipticToEquatorial,
  equatorialToHorizontal,
  julianDaysSinceJ2000,
  obliquityOfEcliptic,
} from './ephemeris';

//////////////////////////////////////////////////////////////////////////////////////

interface PhaseBand {
  /** Exclusive upper bound of the moon age in days. */
  readonly until: number;
  readonly id: MoonPhaseId | null;
}

// Ages below 1.85 days and from 27.7 days on are the new moon.
const PHASE_BANDS: readonly PhaseBand[] = [
  { until: 1.85, id: null },
  { until: 5.5, id: 'crescent-waxing' },
  { until: 9.2, id: 'half-waxing' },
  { until: 20.3, id: 'full' },
  { until: 24.0, id: 'half-waning' },
  { until: 27.7, id: 'crescent-waning' },
];

//////////////////////////////////////////////////////////////////////////////////////

/**
 * Days since the most recent new moon.
 * @returns Age in [0, 29.53).
 */
export const moonAge = (instant: Date): number => {
  const days = (instant.getTime() - REFERENCE_NEW_MOON_MS) / MILLISECONDS_PER_DAY;
  const phase = days % SYNODIC_MONTH_DAYS;
  return phase < 0 ? phase + SYNODIC_MONTH_DAYS : phase;
};

/**
 * Moon phase band for the instant.
 * @returns Phase id, or `null` around the new moon when nothing should be drawn.
 */
export const moonPhaseId = (instant: Date): MoonPhaseId | null => {
  const age = moonAge(instant);
  for (const band of PHASE_BANDS) {
    if (age < band.until) {
      return band.id;
    }
  }
  return null;
};

/**
 * Computes the moon's azimuth and elevation from mean lunar elements with one
 * leading perturbation term each.
 * @param instant Instant of observation.
 * @param latitude Observer latitude in degrees.
 * @param longitude Observer longitude in degrees.
 * @returns Azimuth (0 = north, clockwise) and elevation in degrees.
 */
export const moonPosition = (
  instant: Date,
  latitude: number,
  longitude: number
): HorizontalPosition => {
  const n = julianDaysSinceJ2000(instant);

  const meanLongitude = (218.316 + 13.176396 * n) % 360;
  const meanAnomaly = ((134.963 + 13.064993 * n) % 360) * DEG2RAD;
  const argumentOfLatitude = ((93.272 + 13.22935 * n) % 360) * DEG2RAD;

  const eclipticLongitude = meanLongitude + 6.289 * Math.sin(meanAnomaly);
  const eclipticLatitude = 5.128 * Math.sin(argumentOfLatitude);

  const equatorial = eclipticToEquatorial(
    eclipticLongitude * DEG2RAD,
    eclipticLatitude * DEG2RAD,
    obliquityOfEcliptic(n)
  );
  return equatorialToHorizontal(equatorial, n, instant, latitude, longitude);
};
