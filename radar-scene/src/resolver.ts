// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type {
  DeviceOrientation,
  Friend,
  GeoPoint,
  Landmark,
  MoonPhaseId,
  RadarOptions,
  RadarSettings,
  ResolvedCelestialBody,
  ResolvedFriend,
  ResolvedLandmark,
  ResolvedPlacement,
  ResolvedTarget,
  ScreenSize,
} from './types';
import {
  bearing,
  distance,
  isWithinHorizontalFOV,
  relativeBearing,
} from './utils/geoMath';
import {
  directionFromAzimuthElevation,
  directionVector,
  headingFromRotationMatrix,
  isOnScreen,
  projectToScreen,
} from './projection/projector';
import { DEG2RAD } from './const';
import { sunPosition } from './astro/solarPosition';
import { moonPhaseId, moonPosition } from './astro/lunarPosition';

//////////////////////////////////////////////////////////////////////////////////////

/**
 * Everything needed to place a geographic point on screen.
 */
export interface ResolveContext {
  readonly observer: GeoPoint;
  readonly orientation: DeviceOrientation;
  readonly viewport: ScreenSize;
  readonly options: Pick<
    RadarOptions,
    'horizontalFovDeg' | 'verticalFovDeg' | 'earthRadiusMeters'
  >;
}

const placeCoordinate = (
  coordinate: GeoPoint,
  context: ResolveContext
): ResolvedPlacement | null => {
  const { observer, orientation, viewport, options } = context;
  const screenPoint = projectToScreen(
    directionVector(observer, coordinate, options.earthRadiusMeters),
    orientation,
    options.horizontalFovDeg,
    options.verticalFovDeg,
    viewport
  );
  if (!screenPoint) {
    return null;
  }
  const bearingDeg = bearing(observer, coordinate);
  return {
    screenPoint,
    distanceMeters: distance(observer, coordinate, options.earthRadiusMeters),
    bearingDeg,
    onScreen: isOnScreen(screenPoint, viewport),
    inFieldOfView: isWithinHorizontalFOV(
      bearingDeg,
      headingFromRotationMatrix(orientation),
      options.horizontalFovDeg
    ),
  };
};

//////////////////////////////////////////////////////////////////////////////////////

/**
 * Whether a friend's last location is recent enough to be drawn.
 * A location exactly at the window edge still counts.
 */
export const isFriendLocationFresh = (
  friend: Friend,
  now: Date,
  stalenessSeconds: number
): boolean => {
  if (!friend.location) {
    return false;
  }
  const ageMs = now.getTime() - friend.location.timestamp.getTime();
  return ageMs <= stalenessSeconds * 1000;
};

/**
 * Resolves the friends that have a fresh location in front of the device.
 * @param friends Roster.
 * @param now Frame instant.
 * @param stalenessSeconds Freshness window.
 * @param context Projection inputs.
 * @returns Visible friends in roster order.
 */
export const resolveFriends = (
  friends: readonly Friend[],
  now: Date,
  stalenessSeconds: number,
  context: ResolveContext
): ResolvedFriend[] => {
  const resolved: ResolvedFriend[] = [];
  for (const friend of friends) {
    if (
      !friend.location ||
      !isFriendLocationFresh(friend, now, stalenessSeconds)
    ) {
      continue;
    }
    const placement = placeCoordinate(friend.location, context);
    if (placement) {
      resolved.push({ friend, ...placement });
    }
  }
  return resolved;
};

/**
 * Whether landmarks are drawn at all: the global switch is on and at least one
 * catalog entry is still enabled.
 */
export const landmarksVisible = (
  settings: RadarSettings,
  landmarks: readonly Landmark[]
): boolean =>
  settings.showLandmarks &&
  landmarks.some((landmark) => !settings.disabledLandmarkIds.has(landmark.id));

/**
 * Resolves enabled landmarks in front of the device.
 * @returns Visible landmarks in catalog order, empty when landmarks are switched off.
 */
export const resolveLandmarks = (
  landmarks: readonly Landmark[],
  settings: RadarSettings,
  context: ResolveContext
): ResolvedLandmark[] => {
  if (!settings.showLandmarks) {
    return [];
  }
  const resolved: ResolvedLandmark[] = [];
  for (const landmark of landmarks) {
    if (settings.disabledLandmarkIds.has(landmark.id)) {
      continue;
    }
    const placement = placeCoordinate(landmark.coordinate, context);
    if (placement) {
      resolved.push({ landmark, ...placement });
    }
  }
  return resolved;
};

//////////////////////////////////////////////////////////////////////////////////////

export interface ResolvedCelestialBodies {
  readonly sun: ResolvedCelestialBody;
  readonly moon: ResolvedCelestialBody;
  readonly moonPhaseId: MoonPhaseId | null;
}

/**
 * Places the sun and the moon. Positions are always computed, screen points are
 * `null` when the body is behind the device.
 */
export const resolveCelestialBodies = (
  instant: Date,
  context: ResolveContext
): ResolvedCelestialBodies => {
  const { observer, orientation, viewport, options } = context;
  const place = (
    position: ResolvedCelestialBody['position']
  ): ResolvedCelestialBody => ({
    position,
    screenPoint: projectToScreen(
      directionFromAzimuthElevation(
        position.azimuthDeg,
        position.elevationDeg * DEG2RAD
      ),
      orientation,
      options.horizontalFovDeg,
      options.verticalFovDeg,
      viewport
    ),
  });
  return {
    sun: place(sunPosition(instant, observer.latitude, observer.longitude)),
    moon: place(moonPosition(instant, observer.latitude, observer.longitude)),
    moonPhaseId: moonPhaseId(instant),
  };
};

/**
 * Tracks the navigation target regardless of freshness or visibility.
 * @param friend Target friend.
 * @param context Projection inputs.
 * @param foundRadiusPixels Distance from the viewport centre under which the target counts as found.
 * @returns Target state, or `null` when the friend has no location.
 */
export const resolveTarget = (
  friend: Friend,
  context: ResolveContext,
  foundRadiusPixels: number
): ResolvedTarget | null => {
  if (!friend.location) {
    return null;
  }
  const { observer, orientation, viewport, options } = context;
  const screenPoint = projectToScreen(
    directionVector(observer, friend.location, options.earthRadiusMeters),
    orientation,
    options.horizontalFovDeg,
    options.verticalFovDeg,
    viewport
  );
  const distanceFromCenterPixels = screenPoint
    ? Math.hypot(
        screenPoint.x - viewport.width / 2,
        screenPoint.y - viewport.height / 2
      )
    : null;
  const found =
    distanceFromCenterPixels !== null &&
    distanceFromCenterPixels <= foundRadiusPixels;
  return {
    friend,
    screenPoint,
    arrowAngleDeg: relativeBearing(
      bearing(observer, friend.location),
      headingFromRotationMatrix(orientation)
    ),
    distanceMeters: distance(
      observer,
      friend.location,
      options.earthRadiusMeters
    ),
    distanceFromCenterPixels,
    found,
    showArrow: !found,
  };
};
