// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

export * from './types';
export * from './default';
export { resolveRadarOptions } from './options';
export * from './utils/geoMath';
export * from './astro/solarPosition';
export * from './astro/lunarPosition';
export { isDaytimeWithFallback } from './astro/daylight';
export {
  directionFromAzimuthElevation,
  directionVector,
  headingFromRotationMatrix,
  isOnScreen,
  orientationFromHeadingPitch,
  projectToScreen,
  screenRay,
} from './projection/projector';
export * from './projection/horizon';
export * from './resolver';
export * from './clustering';
export * from './format';
export {
  createStarField,
  DEFAULT_STAR_FIELD,
  visibleStars,
} from './utils/stars';
export * from './landmarks';
export * from './sceneComposer';
