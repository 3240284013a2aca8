// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { RadarOptions, RadarSettings } from './types';
import { EARTH_RADIUS_METERS } from './const';

//////////////////////////////////////////////////////////////////////////////////////////

/**
 * Default values that fill in missing {@link RadarOptions} fields supplied by callers.
 */
export const DEFAULT_RADAR_OPTIONS: RadarOptions = {
  horizontalFovDeg: 60,
  verticalFovDeg: 90,
  friendStalenessSeconds: 300,
  clusterThresholdPixels: 60,
  earthRadiusMeters: EARTH_RADIUS_METERS,
  targetFoundRadiusPixels: 150,
  clusterOffScreenMarginPixels: 50,
  horizonSampleStepDeg: 2,
  horizonBisectionIterations: 20,
  twilightElevationDeg: -6,
  fallbackDayStartHour: 6,
  fallbackDayEndHour: 20,
} as const;

//////////////////////////////////////////////////////////////////////////////////////////

/**
 * Settings used when the caller has none: landmarks shown, nothing disabled.
 */
export const DEFAULT_RADAR_SETTINGS: RadarSettings = {
  showLandmarks: true,
  disabledLandmarkIds: new Set<string>(),
} as const;
