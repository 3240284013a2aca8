// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import { describe, expect, it, vi } from 'vitest';

import { createRadarSceneComposer } from '../src/sceneComposer';
import { DEFAULT_RADAR_SETTINGS } from '../src/default';
import type {
  DeviceOrientation,
  Friend,
  Landmark,
  RadarSceneInput,
} from '../src/types';

const FACING_NORTH: DeviceOrientation = [0, -1, 0, 0, 0, 1, -1, 0, 0];

// Local midnight on the prime meridian: the sun is far below the horizon.
const instant = new Date(Date.UTC(2024, 2, 20, 0));

const friendAt = (
  id: string,
  latitude: number,
  longitude: number
): Friend => ({
  id,
  displayName: id,
  location: {
    latitude,
    longitude,
    timestamp: new Date(instant.getTime() - 30_000),
  },
});

const landmarkAt = (
  id: string,
  latitude: number,
  longitude: number
): Landmark => ({
  id,
  name: id,
  icon: '*',
  coordinate: { latitude, longitude },
  city: 'Test City',
  country: 'Testland',
});

const baseInput: RadarSceneInput = {
  instant,
  viewport: { width: 400, height: 800 },
  orientation: FACING_NORTH,
  observer: { latitude: 0, longitude: 0 },
  friends: [
    friendAt('alice', 1, 0),
    friendAt('carol', 0.5, 0.5),
    friendAt('bob', -1, 0),
  ],
  // near sits about 42px from alice, far about 69px from near
  landmarks: [landmarkAt('near', 0.9, 0.1), landmarkAt('far', 1, 0.3)],
  settings: DEFAULT_RADAR_SETTINGS,
  targetFriendId: 'carol',
};

describe('createRadarSceneComposer', () => {
  it('composes a full frame', () => {
    const scene = createRadarSceneComposer().composeScene(baseInput);

    expect(scene.headingDeg).toBeCloseTo(0, 9);
    expect(scene.cardinal).toBe('N');
    expect(scene.visibleFriends.map((entry) => entry.friend.id)).toEqual([
      'alice',
      'carol',
    ]);
    expect(scene.landmarkClusters.map((cluster) => cluster.id)).toEqual([
      'near+alice',
      'far',
    ]);
    expect(scene.clusteredFriendIds).toEqual(['alice']);
    expect(scene.offScreenClusterIds).toEqual([]);
    expect(scene.individualFriends.map((entry) => entry.friend.id)).toEqual([
      'carol',
    ]);

    expect(scene.horizonPolyline.length).toBeGreaterThan(0);
    expect(scene.earthRegion).toHaveLength(4);
    expect(scene.skyRegion).toHaveLength(4);

    expect(scene.isDaytime).toBe(false);
    expect(scene.sunElevationDeg).toBeCloseTo(-88.132, 2);
    expect(scene.sunScreenPoint).toBeNull();
    expect(scene.moonPhaseId).toBe('full');
    expect(scene.stars).toHaveLength(39);

    expect(scene.target?.friend.id).toBe('carol');
    expect(scene.target?.found).toBe(false);
    expect(scene.target?.showArrow).toBe(true);
  });

  it('returns frozen scenes', () => {
    const scene = createRadarSceneComposer().composeScene(baseInput);
    expect(Object.isFrozen(scene)).toBe(true);
    expect(Object.isFrozen(scene.visibleFriends)).toBe(true);
    expect(Object.isFrozen(scene.landmarkClusters)).toBe(true);
    expect(Object.isFrozen(scene.earthRegion)).toBe(true);
    expect(Object.isFrozen(scene.stars)).toBe(true);
  });

  it('flags clusters outside the padded viewport', () => {
    // bearing about -35 degrees puts the anchor near x = -33
    const input: RadarSceneInput = {
      ...baseInput,
      landmarks: [...baseInput.landmarks, landmarkAt('west', 1, -0.7)],
    };

    const padded = createRadarSceneComposer().composeScene(input);
    const west = padded.landmarkClusters.find(
      (cluster) => cluster.id === 'west'
    );
    expect(west?.position.x).toBeCloseTo(-33.257, 2);
    expect(padded.offScreenClusterIds).toEqual([]);

    const tight = createRadarSceneComposer({
      clusterOffScreenMarginPixels: 10,
    }).composeScene(input);
    expect(tight.offScreenClusterIds).toEqual(['west']);
  });

  it('draws friends individually when landmarks are switched off', () => {
    const scene = createRadarSceneComposer().composeScene({
      ...baseInput,
      settings: { showLandmarks: false, disabledLandmarkIds: new Set() },
    });
    expect(scene.landmarkClusters).toEqual([]);
    expect(scene.clusteredFriendIds).toEqual([]);
    expect(scene.individualFriends.map((entry) => entry.friend.id)).toEqual([
      'alice',
      'carol',
    ]);
  });

  it('applies option overrides', () => {
    const composer = createRadarSceneComposer({ clusterThresholdPixels: 10 });
    expect(composer.options.clusterThresholdPixels).toBe(10);
    const scene = composer.composeScene(baseInput);
    expect(scene.landmarkClusters.map((cluster) => cluster.id)).toEqual([
      'near',
      'far',
    ]);
  });

  it('omits positional output without orientation', () => {
    const scene = createRadarSceneComposer().composeScene({
      ...baseInput,
      orientation: null,
    });
    expect(scene.headingDeg).toBeNull();
    expect(scene.cardinal).toBeNull();
    expect(scene.visibleFriends).toEqual([]);
    expect(scene.landmarkClusters).toEqual([]);
    expect(scene.horizonPolyline).toEqual([]);
    expect(scene.earthRegion).toEqual([]);
    expect(scene.stars).toEqual([]);
    expect(scene.target).toBeNull();
    expect(scene.sun?.screenPoint).toBeNull();
    expect(scene.sunElevationDeg).toBeCloseTo(-88.132, 2);
    expect(scene.isDaytime).toBe(false);
    expect(scene.moonPhaseId).toBe('full');
  });

  it('falls back to the local hour without an observer', () => {
    const scene = createRadarSceneComposer().composeScene({
      ...baseInput,
      observer: null,
      // 09:00 local time
      utcOffsetMinutes: 540,
    });
    expect(scene.isDaytime).toBe(true);
    expect(scene.sun).toBeNull();
    expect(scene.moon).toBeNull();
    expect(scene.sunElevationDeg).toBeNull();
    expect(scene.visibleFriends).toEqual([]);
    expect(scene.headingDeg).toBeCloseTo(0, 9);
    expect(scene.moonPhaseId).toBe('full');
  });

  it('warns once about an orientation that is not a rotation', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const scaled: DeviceOrientation = [0, -2, 0, 0, 0, 2, -2, 0, 0];
    const composer = createRadarSceneComposer();
    composer.composeScene({ ...baseInput, orientation: scaled });
    composer.composeScene({ ...baseInput, orientation: scaled });

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith(
      '[radar-scene] Orientation is not a proper rotation (det=8.000); the scene may be distorted.'
    );
    warnSpy.mockRestore();
  });

  it('composes the snapshot read by tick', () => {
    const composer = createRadarSceneComposer();
    const readSnapshot = vi.fn(() => baseInput);
    const scene = composer.tick({ readSnapshot });
    expect(readSnapshot).toHaveBeenCalledTimes(1);
    expect(scene).toEqual(composer.composeScene(baseInput));
  });
});
