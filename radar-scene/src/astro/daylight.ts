// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { GeoPoint, RadarOptions } from '../types';
import { isDaytime } from './solarPosition';

//////////////////////////////////////////////////////////////////////////////////////

type DaylightOptions = Pick<
  RadarOptions,
  'twilightElevationDeg' | 'fallbackDayStartHour' | 'fallbackDayEndHour'
>;

const localHourOfDay = (instant: Date, utcOffsetMinutes: number): number => {
  const minutes =
    instant.getUTCHours() * 60 + instant.getUTCMinutes() + utcOffsetMinutes;
  const wrapped = ((minutes % 1440) + 1440) % 1440;
  return wrapped / 60;
};

/**
 * Day/night classification that still answers without a location fix.
 * With an observer the sun's elevation decides; otherwise the local wall-clock
 * hour is compared against the fallback day window.
 * @param instant Instant of observation.
 * @param observer Observer position, `null` when unknown.
 * @param options Twilight threshold and fallback day window.
 * @param utcOffsetMinutes Offset of local time from UTC. The runtime's local offset when omitted.
 */
export const isDaytimeWithFallback = (
  instant: Date,
  observer: GeoPoint | null,
  options: DaylightOptions,
  utcOffsetMinutes?: number
): boolean => {
  if (observer) {
    return isDaytime(
      instant,
      observer.latitude,
      observer.longitude,
      options.twilightElevationDeg
    );
  }
  const offset = utcOffsetMinutes ?? -instant.getTimezoneOffset();
  const hour = localHourOfDay(instant, offset);
  return (
    hour >= options.fallbackDayStartHour && hour < options.fallbackDayEndHour
  );
};
