// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { Landmark } from './types';
import catalog from './data/landmarks.json';

/**
 * Built-in catalog of world landmarks.
 */
export const DEFAULT_LANDMARKS: readonly Landmark[] = Object.freeze(
  catalog.map((entry) => Object.freeze({ ...entry }))
);

/**
 * Looks up a landmark by id.
 */
export const findLandmark = (
  landmarks: readonly Landmark[],
  id: string
): Landmark | undefined => landmarks.find((landmark) => landmark.id === id);

/**
 * "City, Country" label shown under a landmark name.
 */
export const landmarkLocationLabel = (landmark: Landmark): string =>
  `${landmark.city}, ${landmark.country}`;
