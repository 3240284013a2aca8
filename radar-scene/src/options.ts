// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { RadarOptions } from './types';
import { DEFAULT_RADAR_OPTIONS } from './default';

//////////////////////////////////////////////////////////////////////////////////////////

type NumericRule = 'positive' | 'finite' | 'fov' | 'hour' | 'iterations';

const RULES: Readonly<Record<keyof RadarOptions, NumericRule>> = {
  horizontalFovDeg: 'fov',
  verticalFovDeg: 'fov',
  friendStalenessSeconds: 'positive',
  clusterThresholdPixels: 'positive',
  earthRadiusMeters: 'positive',
  targetFoundRadiusPixels: 'positive',
  clusterOffScreenMarginPixels: 'finite',
  horizonSampleStepDeg: 'positive',
  horizonBisectionIterations: 'iterations',
  twilightElevationDeg: 'finite',
  fallbackDayStartHour: 'hour',
  fallbackDayEndHour: 'hour',
};

const RULE_DESCRIPTIONS: Readonly<Record<NumericRule, string>> = {
  positive: 'must be a positive number',
  finite: 'is not finite',
  fov: 'must be greater than 0 and less than 180',
  hour: 'must be an hour between 0 and 24',
  iterations: 'must be an integer between 1 and 64',
};

const meetsRule = (value: number, rule: NumericRule): boolean => {
  if (!Number.isFinite(value)) {
    return false;
  }
  switch (rule) {
    case 'positive':
      return value > 0;
    case 'finite':
      return true;
    case 'fov':
      return value > 0 && value < 180;
    case 'hour':
      return value >= 0 && value <= 24;
    case 'iterations':
      return Number.isInteger(value) && value >= 1 && value <= 64;
  }
};

const OPTION_KEYS: readonly (keyof RadarOptions)[] = [
  'horizontalFovDeg',
  'verticalFovDeg',
  'friendStalenessSeconds',
  'clusterThresholdPixels',
  'earthRadiusMeters',
  'targetFoundRadiusPixels',
  'clusterOffScreenMarginPixels',
  'horizonSampleStepDeg',
  'horizonBisectionIterations',
  'twilightElevationDeg',
  'fallbackDayStartHour',
  'fallbackDayEndHour',
];

/**
 * Fills missing radar option fields with defaults.
 * Invalid values fall back to the default and a single aggregated warning is emitted.
 * @param options Partial overrides.
 * @returns Complete options.
 */
export const resolveRadarOptions = (
  options?: Partial<RadarOptions>
): RadarOptions => {
  const warnings: string[] = [];
  const resolved: Record<keyof RadarOptions, number> = {
    ...DEFAULT_RADAR_OPTIONS,
  };

  for (const key of OPTION_KEYS) {
    const value = options?.[key];
    if (value === undefined) {
      continue;
    }
    const rule = RULES[key];
    if (meetsRule(value, rule)) {
      resolved[key] = value;
    } else {
      warnings.push(
        `${key}(${String(value)}) ${RULE_DESCRIPTIONS[rule]}; using ${DEFAULT_RADAR_OPTIONS[key]}`
      );
    }
  }

  if (resolved.fallbackDayEndHour <= resolved.fallbackDayStartHour) {
    warnings.push(
      `fallbackDayEndHour(${resolved.fallbackDayEndHour}) <= fallbackDayStartHour(${resolved.fallbackDayStartHour}); using ${DEFAULT_RADAR_OPTIONS.fallbackDayStartHour}..${DEFAULT_RADAR_OPTIONS.fallbackDayEndHour}`
    );
    resolved.fallbackDayStartHour = DEFAULT_RADAR_OPTIONS.fallbackDayStartHour;
    resolved.fallbackDayEndHour = DEFAULT_RADAR_OPTIONS.fallbackDayEndHour;
  }

  if (warnings.length > 0 && typeof console !== 'undefined') {
    const warn = console.warn ?? null;
    if (typeof warn === 'function') {
      warn(`[RadarOptions] ${warnings.join('; ')}`);
    }
  }

  return resolved;
};
