// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import { mat3 } from 'gl-matrix';

import type {
  DeviceOrientation,
  GeoPoint,
  MoonPhaseId,
  RadarOptions,
  RadarScene,
  RadarSceneInput,
  RadarSnapshotSource,
  ResolvedCelestialBody,
  ResolvedTarget,
} from './types';
import { RADAR_DEBUG } from './config';
import { ORIENTATION_DETERMINANT_TOLERANCE } from './const';
import { resolveRadarOptions } from './options';
import { headingFromRotationMatrix } from './projection/projector';
import type { HorizonView } from './projection/horizon';
import {
  earthRegion,
  horizonScreenPoints,
  skyRegion,
} from './projection/horizon';
import { isDaytimeWithFallback } from './astro/daylight';
import { sunPosition } from './astro/solarPosition';
import { moonPhaseId, moonPosition } from './astro/lunarPosition';
import type { ResolveContext } from './resolver';
import {
  landmarksVisible,
  resolveCelestialBodies,
  resolveFriends,
  resolveLandmarks,
  resolveTarget,
} from './resolver';
import {
  clusterLandmarks,
  collectClusteredFriendIds,
  isClusterOffScreen,
} from './clustering';
import { cardinalDirection } from './format';
import { DEFAULT_STAR_FIELD, visibleStars } from './utils/stars';

//////////////////////////////////////////////////////////////////////////////////////

/**
 * Per-frame scene builder bound to one set of options.
 */
export interface RadarSceneComposer {
  /** Resolved options in effect. */
  readonly options: RadarOptions;
  /** Builds the scene for one snapshot. */
  readonly composeScene: (input: RadarSceneInput) => RadarScene;
  /** Reads the current snapshot from the source and builds its scene. */
  readonly tick: (source: RadarSnapshotSource) => RadarScene;
}

const logWarning = (message: string) => {
  if (typeof console !== 'undefined' && typeof console.warn === 'function') {
    console.warn(`[radar-scene] ${message}`);
  }
};

const isProperRotation = (orientation: DeviceOrientation): boolean =>
  Math.abs(mat3.determinant(orientation) - 1) <=
  ORIENTATION_DETERMINANT_TOLERANCE;

interface CelestialState {
  readonly sun: ResolvedCelestialBody | null;
  readonly moon: ResolvedCelestialBody | null;
}

const unprojectedCelestialBodies = (
  instant: Date,
  observer: GeoPoint | null
): CelestialState => {
  if (!observer) {
    return { sun: null, moon: null };
  }
  return {
    sun: {
      position: sunPosition(instant, observer.latitude, observer.longitude),
      screenPoint: null,
    },
    moon: {
      position: moonPosition(instant, observer.latitude, observer.longitude),
      screenPoint: null,
    },
  };
};

/**
 * Creates a scene composer.
 * @param options Partial overrides of {@link DEFAULT_RADAR_OPTIONS}.
 * @returns Composer. Scenes it returns are frozen along with their arrays;
 * the entries inside the arrays are not.
 */
export const createRadarSceneComposer = (
  options?: Partial<RadarOptions>
): RadarSceneComposer => {
  const resolvedOptions = resolveRadarOptions(options);
  let orientationWarned = false;

  const checkOrientation = (orientation: DeviceOrientation) => {
    if (!orientationWarned && !isProperRotation(orientation)) {
      orientationWarned = true;
      logWarning(
        `Orientation is not a proper rotation (det=${mat3.determinant(orientation).toFixed(3)}); the scene may be distorted.`
      );
    }
  };

  const composeScene = (input: RadarSceneInput): RadarScene => {
    const { instant, viewport, orientation, observer } = input;

    const isDaytime = isDaytimeWithFallback(
      instant,
      observer,
      resolvedOptions,
      input.utcOffsetMinutes
    );

    let headingDeg: number | null = null;
    let horizonPolyline: RadarScene['horizonPolyline'] = [];
    let earth: RadarScene['earthRegion'] = [];
    let sky: RadarScene['skyRegion'] = [];
    let stars: RadarScene['stars'] = [];
    let visibleFriends: RadarScene['visibleFriends'] = [];
    let individualFriends: RadarScene['individualFriends'] = [];
    let landmarkClusters: RadarScene['landmarkClusters'] = [];
    let offScreenClusterIds: RadarScene['offScreenClusterIds'] = [];
    let clusteredFriendIds: RadarScene['clusteredFriendIds'] = [];
    let celestial: CelestialState = unprojectedCelestialBodies(
      instant,
      observer
    );
    let phase: MoonPhaseId | null = null;
    let target: ResolvedTarget | null = null;

    if (orientation) {
      checkOrientation(orientation);
      headingDeg = headingFromRotationMatrix(orientation);

      const view: HorizonView = {
        orientation,
        horizontalFovDeg: resolvedOptions.horizontalFovDeg,
        verticalFovDeg: resolvedOptions.verticalFovDeg,
        viewport,
      };
      horizonPolyline = horizonScreenPoints(
        view,
        resolvedOptions.horizonSampleStepDeg
      );
      earth = earthRegion(view, resolvedOptions.horizonBisectionIterations);
      sky = skyRegion(view, resolvedOptions.horizonBisectionIterations);
      if (!isDaytime) {
        stars = visibleStars(DEFAULT_STAR_FIELD, viewport, horizonPolyline);
      }

      if (observer) {
        const context: ResolveContext = {
          observer,
          orientation,
          viewport,
          options: resolvedOptions,
        };

        const friends = resolveFriends(
          input.friends,
          instant,
          resolvedOptions.friendStalenessSeconds,
          context
        );
        const landmarks = landmarksVisible(input.settings, input.landmarks)
          ? resolveLandmarks(input.landmarks, input.settings, context)
          : [];
        const clusters = clusterLandmarks(
          landmarks,
          friends,
          resolvedOptions.clusterThresholdPixels
        );
        const clustered = collectClusteredFriendIds(clusters);

        visibleFriends = friends;
        individualFriends = friends.filter(
          (entry) => !clustered.has(entry.friend.id)
        );
        landmarkClusters = clusters;
        offScreenClusterIds = clusters
          .filter((cluster) =>
            isClusterOffScreen(
              cluster,
              viewport,
              resolvedOptions.clusterOffScreenMarginPixels
            )
          )
          .map((cluster) => cluster.id);
        clusteredFriendIds = [...clustered];

        const bodies = resolveCelestialBodies(instant, context);
        celestial = { sun: bodies.sun, moon: bodies.moon };
        phase = bodies.moonPhaseId;

        const targetFriend =
          input.targetFriendId === undefined
            ? undefined
            : input.friends.find(
                (friend) => friend.id === input.targetFriendId
              );
        if (targetFriend) {
          target = resolveTarget(
            targetFriend,
            context,
            resolvedOptions.targetFoundRadiusPixels
          );
        }
      }
    }

    if (!observer || !orientation) {
      phase = moonPhaseId(instant);
    }

    const scene: RadarScene = Object.freeze({
      headingDeg,
      cardinal: headingDeg === null ? null : cardinalDirection(headingDeg),
      visibleFriends: Object.freeze(visibleFriends),
      individualFriends: Object.freeze(individualFriends),
      landmarkClusters: Object.freeze(landmarkClusters),
      offScreenClusterIds: Object.freeze(offScreenClusterIds),
      clusteredFriendIds: Object.freeze(clusteredFriendIds),
      horizonPolyline: Object.freeze(horizonPolyline),
      earthRegion: Object.freeze(earth),
      skyRegion: Object.freeze(sky),
      isDaytime,
      sunElevationDeg: celestial.sun ? celestial.sun.position.elevationDeg : null,
      sun: celestial.sun,
      moon: celestial.moon,
      sunScreenPoint: celestial.sun ? celestial.sun.screenPoint : null,
      moonScreenPoint: celestial.moon ? celestial.moon.screenPoint : null,
      moonPhaseId: phase,
      stars: Object.freeze(stars),
      target,
    });

    if (RADAR_DEBUG) {
      console.debug('[radar-scene] frame', {
        headingDeg,
        friends: visibleFriends.length,
        clusters: landmarkClusters.length,
        horizonSamples: horizonPolyline.length,
        isDaytime,
      });
    }

    return scene;
  };

  const tick = (source: RadarSnapshotSource): RadarScene =>
    composeScene(source.readSnapshot());

  return {
    options: resolvedOptions,
    composeScene,
    tick,
  };
};
