// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { DeviceOrientation, ScreenPoint, ScreenSize } from '../types';
import {
  directionFromAzimuthElevation,
  projectToScreen,
  screenRay,
} from './projector';

//////////////////////////////////////////////////////////////////////////////////////

const DEFAULT_SAMPLE_STEP_DEG = 2;
const DEFAULT_BISECTION_ITERATIONS = 20;

/**
 * Camera parameters shared by the horizon helpers.
 */
export interface HorizonView {
  readonly orientation: DeviceOrientation;
  readonly horizontalFovDeg: number;
  readonly verticalFovDeg: number;
  readonly viewport: ScreenSize;
}

//////////////////////////////////////////////////////////////////////////////////////

/**
 * Samples the horizon (elevation 0) around the full circle and keeps the samples
 * in front of the device. Degenerates when looking straight up or down; use
 * {@link earthRegion} for the ground fill.
 * @param view Camera parameters.
 * @param stepDeg Azimuth sampling step.
 * @returns Points sorted by x.
 */
export const horizonScreenPoints = (
  view: HorizonView,
  stepDeg: number = DEFAULT_SAMPLE_STEP_DEG
): ScreenPoint[] => {
  const points: ScreenPoint[] = [];
  for (let azimuth = 0; azimuth < 360; azimuth += stepDeg) {
    const point = projectToScreen(
      directionFromAzimuthElevation(azimuth, 0),
      view.orientation,
      view.horizontalFovDeg,
      view.verticalFovDeg,
      view.viewport
    );
    if (point) {
      points.push(point);
    }
  }
  return points.sort((a, b) => a.x - b.x);
};

/**
 * Whether the ray through a screen point goes below the horizontal.
 */
export const isEarthAt = (point: ScreenPoint, view: HorizonView): boolean =>
  screenRay(
    point,
    view.orientation,
    view.horizontalFovDeg,
    view.verticalFovDeg,
    view.viewport
  ).z < 0;

const lerpPoint = (a: ScreenPoint, b: ScreenPoint, t: number): ScreenPoint => ({
  x: a.x + (b.x - a.x) * t,
  y: a.y + (b.y - a.y) * t,
});

/**
 * Finds the earth/sky crossing on a segment whose endpoints disagree.
 */
const bisectCrossing = (
  from: ScreenPoint,
  to: ScreenPoint,
  fromIsEarth: boolean,
  view: HorizonView,
  iterations: number
): ScreenPoint => {
  let lo = 0;
  let hi = 1;
  for (let i = 0; i < iterations; i++) {
    const mid = (lo + hi) / 2;
    if (isEarthAt(lerpPoint(from, to, mid), view) === fromIsEarth) {
      lo = mid;
    } else {
      hi = mid;
    }
  }
  return lerpPoint(from, to, (lo + hi) / 2);
};

const screenCorners = (viewport: ScreenSize): ScreenPoint[] => [
  { x: 0, y: 0 },
  { x: viewport.width, y: 0 },
  { x: viewport.width, y: viewport.height },
  { x: 0, y: viewport.height },
];

/**
 * Walks the viewport outline (TL, TR, BR, BL) and collects the corners on the
 * requested side of the horizon plus the crossing points of the edges in between.
 */
const traceRegion = (
  view: HorizonView,
  earthSide: boolean,
  iterations: number
): ScreenPoint[] => {
  const corners = screenCorners(view.viewport);
  const classes = corners.map((corner) => isEarthAt(corner, view));
  const polygon: ScreenPoint[] = [];

  corners.forEach((corner, index) => {
    const cornerIsEarth = classes[index];
    if (cornerIsEarth === earthSide) {
      polygon.push(corner);
    }
    const nextIndex = (index + 1) % corners.length;
    if (classes[nextIndex] !== cornerIsEarth) {
      polygon.push(
        bisectCrossing(
          corner,
          corners[nextIndex],
          cornerIsEarth,
          view,
          iterations
        )
      );
    }
  });

  return polygon;
};

/**
 * Screen polygon to fill as ground. The whole viewport when every corner is
 * below the horizon, empty when none is.
 * @param view Camera parameters.
 * @param iterations Bisection steps per crossing edge.
 */
export const earthRegion = (
  view: HorizonView,
  iterations: number = DEFAULT_BISECTION_ITERATIONS
): ScreenPoint[] => traceRegion(view, true, iterations);

/**
 * Screen polygon above the horizon, complementary to {@link earthRegion}.
 */
export const skyRegion = (
  view: HorizonView,
  iterations: number = DEFAULT_BISECTION_ITERATIONS
): ScreenPoint[] => traceRegion(view, false, iterations);

/**
 * Mean y of a horizon polyline, `null` for fewer than two points.
 */
export const averageHorizonY = (
  points: readonly ScreenPoint[]
): number | null => {
  if (points.length < 2) {
    return null;
  }
  let sum = 0;
  for (const point of points) {
    sum += point.y;
  }
  return sum / points.length;
};
