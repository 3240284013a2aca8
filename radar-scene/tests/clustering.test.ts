// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import { describe, expect, it } from 'vitest';

import {
  clusterId,
  clusterLandmarks,
  collectClusteredFriendIds,
  createEntityCluster,
  findClusterContainingFriend,
  isClusterOffScreen,
} from '../src/clustering';
import type {
  EntityCluster,
  ResolvedFriend,
  ResolvedLandmark,
} from '../src/types';

const landmark = (
  id: string,
  x: number,
  y: number,
  distanceMeters = 1000
): ResolvedLandmark => ({
  landmark: {
    id,
    name: id,
    icon: '*',
    coordinate: { latitude: 0, longitude: 0 },
    city: 'Test City',
    country: 'Testland',
  },
  screenPoint: { x, y },
  distanceMeters,
  bearingDeg: 0,
  onScreen: true,
  inFieldOfView: true,
});

const friend = (id: string, x: number, y: number): ResolvedFriend => ({
  friend: { id, displayName: id },
  screenPoint: { x, y },
  distanceMeters: 500,
  bearingDeg: 0,
  onScreen: true,
  inFieldOfView: true,
});

const ids = (clusters: EntityCluster[]) => clusters.map((cluster) => cluster.id);

describe('clusterId', () => {
  it('sorts landmark and friend ids', () => {
    expect(clusterId(['b', 'a'], [])).toBe('a-b');
    expect(clusterId(['b', 'a'], ['z', 'y'])).toBe('a-b+y-z');
  });
});

describe('createEntityCluster', () => {
  it('derives the display flags', () => {
    const single = createEntityCluster([landmark('a', 0, 0)], [], { x: 0, y: 0 });
    expect(single.isSingle).toBe(true);
    expect(single.isMixed).toBe(false);
    expect(single.totalCount).toBe(1);

    const mixed = createEntityCluster(
      [landmark('a', 0, 0)],
      [friend('f', 0, 0)],
      { x: 0, y: 0 }
    );
    expect(mixed.isSingle).toBe(false);
    expect(mixed.isMixed).toBe(true);
    expect(mixed.totalCount).toBe(2);
    expect(mixed.id).toBe('a+f');
  });
});

describe('clusterLandmarks', () => {
  it('returns nothing without landmarks', () => {
    expect(clusterLandmarks([], [friend('f', 0, 0)], 60)).toEqual([]);
  });

  it('merges landmarks closer than the threshold', () => {
    const clusters = clusterLandmarks(
      [landmark('a', 100, 100), landmark('b', 130, 140)],
      [],
      60
    );
    expect(ids(clusters)).toEqual(['a-b']);
    expect(clusters[0].position).toEqual({ x: 100, y: 100 });
    expect(clusters[0].isSingle).toBe(false);
  });

  it('keeps landmarks at or beyond the threshold apart', () => {
    const clusters = clusterLandmarks(
      [landmark('a', 100, 100), landmark('b', 160, 100)],
      [],
      60
    );
    expect(ids(clusters)).toEqual(['a', 'b']);
    expect(clusters.every((cluster) => cluster.isSingle)).toBe(true);
  });

  it('does not chain overlaps through an intermediate landmark', () => {
    const clusters = clusterLandmarks(
      [landmark('a', 0, 0), landmark('b', 50, 0), landmark('c', 100, 0)],
      [],
      60
    );
    expect(ids(clusters)).toEqual(['a-b', 'c']);
  });

  it('produces the same ids regardless of input order', () => {
    const entries = [
      landmark('a', 10, 10),
      landmark('b', 20, 15),
      landmark('c', 400, 400),
      landmark('d', 405, 390),
    ];
    const forward = clusterLandmarks(entries, [], 60);
    const backward = clusterLandmarks([...entries].reverse(), [], 60);
    expect(ids(forward).sort()).toEqual(['a-b', 'c-d']);
    expect(ids(backward).sort()).toEqual(ids(forward).sort());
  });

  it('orders landmarks inside a cluster by distance', () => {
    const [cluster] = clusterLandmarks(
      [
        landmark('far', 0, 0, 9000),
        landmark('near', 10, 0, 100),
        landmark('mid', 0, 10, 500),
      ],
      [],
      60
    );
    expect(cluster.landmarks.map((entry) => entry.landmark.id)).toEqual([
      'near',
      'mid',
      'far',
    ]);
    expect(cluster.id).toBe('far-mid-near');
  });

  it('absorbs nearby friends into mixed clusters', () => {
    const clusters = clusterLandmarks(
      [landmark('a', 100, 100), landmark('b', 300, 300)],
      [friend('f1', 120, 100), friend('f2', 200, 200), friend('f3', 300, 330)],
      60
    );
    expect(ids(clusters)).toEqual(['a+f1', 'b+f3']);
    expect(clusters[0].isMixed).toBe(true);
    expect(clusters[0].isSingle).toBe(false);
    expect(collectClusteredFriendIds(clusters)).toEqual(new Set(['f1', 'f3']));
  });

  it('assigns each friend to the first cluster that reaches it', () => {
    const clusters = clusterLandmarks(
      [landmark('a', 0, 0), landmark('b', 80, 0)],
      [friend('f', 40, 0)],
      60
    );
    expect(ids(clusters)).toEqual(['a+f', 'b']);
    expect(findClusterContainingFriend(clusters, 'f')?.id).toBe('a+f');
    expect(findClusterContainingFriend(clusters, 'missing')).toBeUndefined();
  });

  it('uses the seed position for friends', () => {
    // f is within 60px of b but not of the seed a
    const clusters = clusterLandmarks(
      [landmark('a', 0, 0), landmark('b', 50, 0)],
      [friend('f', 100, 0)],
      60
    );
    expect(ids(clusters)).toEqual(['a-b']);
  });

  it('handles positions far outside the viewport', () => {
    const clusters = clusterLandmarks(
      [landmark('a', -5000, 2000), landmark('b', -4990, 2010)],
      [friend('f', 9000, -9000)],
      60
    );
    expect(ids(clusters)).toEqual(['a-b']);
  });
});

describe('isClusterOffScreen', () => {
  const viewport = { width: 400, height: 800 };
  const at = (x: number, y: number) =>
    createEntityCluster([landmark('a', x, y)], [], { x, y });

  it('uses a padded viewport', () => {
    expect(isClusterOffScreen(at(200, 400), viewport)).toBe(false);
    expect(isClusterOffScreen(at(-40, 400), viewport)).toBe(false);
    expect(isClusterOffScreen(at(-60, 400), viewport)).toBe(true);
    expect(isClusterOffScreen(at(-40, 400), viewport, 10)).toBe(true);
  });
});
