// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { PlacedStar, ScreenPoint, ScreenSize, Star } from '../types';
import { STAR_FIELD_COUNT, STAR_FIELD_SEED } from '../config';
import { averageHorizonY } from '../projection/horizon';

//////////////////////////////////////////////////////////////////////////////////////

const UINT64_MASK = (1n << 64n) - 1n;

/**
 * Deterministic xorshift64 sequence of unit floats in [0, 1).
 */
const createUnitRandom = (seed: number): (() => number) => {
  // xorshift has a fixed point at zero
  let state = BigInt(Math.trunc(seed)) & UINT64_MASK;
  if (state === 0n) {
    state = 1n;
  }
  return () => {
    state ^= (state << 13n) & UINT64_MASK;
    state ^= state >> 7n;
    state ^= (state << 17n) & UINT64_MASK;
    return Number(state >> 11n) / 2 ** 53;
  };
};

/**
 * Builds the background star table. Same seed, same table.
 * @param seed Generator seed.
 * @param count Number of stars.
 * @returns Frozen star table with normalized positions.
 */
export const createStarField = (
  seed: number = STAR_FIELD_SEED,
  count: number = STAR_FIELD_COUNT
): readonly Star[] => {
  const next = createUnitRandom(seed);
  const stars: Star[] = [];
  for (let i = 0; i < count; i++) {
    const x = next();
    const y = next();
    const radius = 1 + next();
    const opacity = 0.3 + next() * 0.3;
    stars.push(Object.freeze({ x, y, radius, opacity }));
  }
  return Object.freeze(stars);
};

/** Star table shared by every composer. */
export const DEFAULT_STAR_FIELD: readonly Star[] = createStarField();

/**
 * Places stars on the viewport and keeps those above the mean horizon line.
 * @param field Star table.
 * @param viewport Screen size.
 * @param horizonPoints Sampled horizon polyline.
 * @returns Placed stars, empty when the horizon is not visible.
 */
export const visibleStars = (
  field: readonly Star[],
  viewport: ScreenSize,
  horizonPoints: readonly ScreenPoint[]
): PlacedStar[] => {
  const horizonY = averageHorizonY(horizonPoints);
  if (horizonY === null) {
    return [];
  }
  const placed: PlacedStar[] = [];
  for (const star of field) {
    const point = { x: star.x * viewport.width, y: star.y * viewport.height };
    if (point.y < horizonY) {
      placed.push({ point, radius: star.radius, opacity: star.opacity });
    }
  }
  return placed;
};
