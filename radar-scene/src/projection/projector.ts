// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import { mat3, vec3 } from 'gl-matrix';
import type { ReadonlyVec3 } from 'gl-matrix';

import type {
  DeviceOrientation,
  GeoPoint,
  ScreenPoint,
  ScreenSize,
  WorldDirection,
} from '../types';
import { DEG2RAD, DEVICE_FORWARD_AXIS, EARTH_RADIUS_METERS } from '../const';
import {
  bearing,
  distance,
  toDegrees,
  trueElevationAngle,
  wrap360,
} from '../utils/geoMath';

//////////////////////////////////////////////////////////////////////////////////////

// gl-matrix stores matrices column-major, while DeviceOrientation is row-major.
// Reading the row-major tuple as column-major yields the transpose (device -> world).
// Outputs are plain tuples so the math stays in double precision.

const createVec3 = (): vec3 => [0, 0, 0];

const createMat3 = (): mat3 => [0, 0, 0, 0, 0, 0, 0, 0, 0];

const toVec3 = (direction: WorldDirection): vec3 => [
  direction.x,
  direction.y,
  direction.z,
];

const toWorldDirection = (v: ReadonlyVec3): WorldDirection => ({
  x: v[0],
  y: v[1],
  z: v[2],
});

/**
 * Rotates a world (NWU) vector into the device frame: `R · v`.
 */
export const rotateWorldToDevice = (
  orientation: DeviceOrientation,
  direction: WorldDirection
): vec3 => {
  const worldToDevice = mat3.transpose(createMat3(), orientation);
  return vec3.transformMat3(createVec3(), toVec3(direction), worldToDevice);
};

/**
 * Rotates a device-frame vector back into the world frame: `Rᵗ · v`.
 */
export const rotateDeviceToWorld = (
  orientation: DeviceOrientation,
  deviceVector: ReadonlyVec3
): WorldDirection =>
  toWorldDirection(
    vec3.transformMat3(createVec3(), deviceVector, orientation)
  );

//////////////////////////////////////////////////////////////////////////////////////

/**
 * Unit world direction for an azimuth and an elevation.
 * @param azimuthDeg Degrees, 0 = north, clockwise.
 * @param elevationRad Radians above the horizontal.
 */
export const directionFromAzimuthElevation = (
  azimuthDeg: number,
  elevationRad: number
): WorldDirection => {
  const azimuth = azimuthDeg * DEG2RAD;
  const cosElevation = Math.cos(elevationRad);
  // y is west while azimuth grows toward east
  return {
    x: cosElevation * Math.cos(azimuth),
    y: -cosElevation * Math.sin(azimuth),
    z: Math.sin(elevationRad),
  };
};

/**
 * Direction of the straight chord from the observer toward a remote coordinate.
 * @param from Observer.
 * @param to Target.
 * @param earthRadiusMeters Sphere radius.
 */
export const directionVector = (
  from: GeoPoint,
  to: GeoPoint,
  earthRadiusMeters: number = EARTH_RADIUS_METERS
): WorldDirection =>
  directionFromAzimuthElevation(
    bearing(from, to),
    trueElevationAngle(distance(from, to, earthRadiusMeters), earthRadiusMeters)
  );

/**
 * Projects a world direction onto the screen with an angular pinhole model.
 * @param worldDirection Unit direction in the NWU frame.
 * @param orientation World-to-device rotation.
 * @param horizontalFovDeg Total horizontal field of view.
 * @param verticalFovDeg Total vertical field of view.
 * @param viewport Screen size.
 * @returns Unclamped screen point, or `null` when the direction is not in front of the device.
 */
export const projectToScreen = (
  worldDirection: WorldDirection,
  orientation: DeviceOrientation,
  horizontalFovDeg: number,
  verticalFovDeg: number,
  viewport: ScreenSize
): ScreenPoint | null => {
  const device = rotateWorldToDevice(orientation, worldDirection);
  const depth = -device[2];
  if (!(depth > 0)) {
    return null;
  }

  const angleX = Math.atan2(device[0], depth);
  const angleY = Math.atan2(device[1], depth);

  const halfWidth = viewport.width / 2;
  const halfHeight = viewport.height / 2;
  const halfHorizontalFov = (horizontalFovDeg / 2) * DEG2RAD;
  const halfVerticalFov = (verticalFovDeg / 2) * DEG2RAD;

  return {
    x: halfWidth + (angleX / halfHorizontalFov) * halfWidth,
    y: halfHeight - (angleY / halfVerticalFov) * halfHeight,
  };
};

/**
 * Inverse of {@link projectToScreen}: the world ray seen through a screen point.
 * The returned vector is not normalized; only its direction is meaningful.
 */
export const screenRay = (
  point: ScreenPoint,
  orientation: DeviceOrientation,
  horizontalFovDeg: number,
  verticalFovDeg: number,
  viewport: ScreenSize
): WorldDirection => {
  const halfWidth = viewport.width / 2;
  const halfHeight = viewport.height / 2;
  const angleX =
    ((point.x - halfWidth) / halfWidth) * (horizontalFovDeg / 2) * DEG2RAD;
  const angleY =
    ((halfHeight - point.y) / halfHeight) * (verticalFovDeg / 2) * DEG2RAD;
  return rotateDeviceToWorld(orientation, [
    Math.tan(angleX),
    Math.tan(angleY),
    -1,
  ]);
};

//////////////////////////////////////////////////////////////////////////////////////

/**
 * Compass heading of the device's forward axis.
 * @returns Degrees in [0, 360).
 */
export const headingFromRotationMatrix = (
  orientation: DeviceOrientation
): number => {
  const forward = rotateDeviceToWorld(orientation, DEVICE_FORWARD_AXIS);
  // x is north and y is west, so east is -y
  return wrap360(toDegrees(Math.atan2(-forward.y, forward.x)));
};

/**
 * Builds the world-to-device rotation of an upright device (portrait, no roll)
 * looking toward a heading with a pitch.
 * @param headingDeg Compass heading, 0 = north.
 * @param pitchDeg Elevation of the forward axis, positive looks up.
 */
export const orientationFromHeadingPitch = (
  headingDeg: number,
  pitchDeg: number
): DeviceOrientation => {
  const heading = headingDeg * DEG2RAD;
  const pitch = pitchDeg * DEG2RAD;
  const forward: vec3 = [
    Math.cos(pitch) * Math.cos(heading),
    -Math.cos(pitch) * Math.sin(heading),
    Math.sin(pitch),
  ];
  const right: vec3 = [-Math.sin(heading), -Math.cos(heading), 0];
  const backward = vec3.negate(createVec3(), forward);
  const up = vec3.cross(createVec3(), backward, right);
  // Rows are the device axes expressed in world coordinates
  return [
    right[0],
    right[1],
    right[2],
    up[0],
    up[1],
    up[2],
    backward[0],
    backward[1],
    backward[2],
  ];
};

/**
 * Whether a screen point lies inside the viewport, optionally padded.
 */
export const isOnScreen = (
  point: ScreenPoint,
  viewport: ScreenSize,
  margin = 0
): boolean =>
  point.x >= -margin &&
  point.x <= viewport.width + margin &&
  point.y >= -margin &&
  point.y <= viewport.height + margin;
