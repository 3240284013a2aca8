// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

/** Debug flag */
export const RADAR_DEBUG = false;

/** Default number of background stars. */
export const STAR_FIELD_COUNT = 80;

/** Seed of the background star table. */
export const STAR_FIELD_SEED = 42;
