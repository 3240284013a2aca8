// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type {
  EntityCluster,
  ResolvedFriend,
  ResolvedLandmark,
  ScreenPoint,
  ScreenSize,
} from './types';
import { isOnScreen } from './projection/projector';
import { boundsOfPoints, createPointQuadTree } from './utils/pointQuadTree';

//////////////////////////////////////////////////////////////////////////////////////

const DEFAULT_CLUSTER_THRESHOLD_PIXELS = 60;
const DEFAULT_OFF_SCREEN_MARGIN_PIXELS = 50;

type ClusterEntry =
  | { readonly kind: 'landmark'; readonly index: number }
  | { readonly kind: 'friend'; readonly index: number };

const pixelDistance = (a: ScreenPoint, b: ScreenPoint): number =>
  Math.hypot(a.x - b.x, a.y - b.y);

/**
 * Stable cluster key. Sorted landmark ids joined with `-`, followed by `+` and the
 * sorted friend ids when there are any.
 */
export const clusterId = (
  landmarkIds: readonly string[],
  friendIds: readonly string[]
): string => {
  const landmarkPart = [...landmarkIds].sort().join('-');
  if (friendIds.length === 0) {
    return landmarkPart;
  }
  return `${landmarkPart}+${[...friendIds].sort().join('-')}`;
};

/**
 * Builds a cluster record from its members.
 * @param landmarks Member landmarks, kept in the given order.
 * @param friends Member friends.
 * @param position Anchor position.
 */
export const createEntityCluster = (
  landmarks: readonly ResolvedLandmark[],
  friends: readonly ResolvedFriend[],
  position: ScreenPoint
): EntityCluster => ({
  id: clusterId(
    landmarks.map((entry) => entry.landmark.id),
    friends.map((entry) => entry.friend.id)
  ),
  landmarks,
  friends,
  position,
  isSingle: landmarks.length === 1 && friends.length === 0,
  isMixed: friends.length > 0,
  totalCount: landmarks.length + friends.length,
});

/**
 * Groups screen-proximate landmarks, then pulls nearby friends into the groups.
 *
 * Each unassigned landmark seeds a cluster in input order and absorbs every other
 * unassigned landmark closer than `thresholdPixels` to the seed. Membership is
 * measured against the seed only, so overlaps do not chain. Unassigned friends
 * closer than the threshold to the seed join the same cluster.
 * @param landmarks Visible landmarks with their screen positions.
 * @param friends Visible friends with their screen positions.
 * @param thresholdPixels Merge distance.
 * @returns Clusters in seed order; landmarks inside each are ordered closest first.
 */
export const clusterLandmarks = (
  landmarks: readonly ResolvedLandmark[],
  friends: readonly ResolvedFriend[],
  thresholdPixels: number = DEFAULT_CLUSTER_THRESHOLD_PIXELS
): EntityCluster[] => {
  if (landmarks.length === 0) {
    return [];
  }

  const points = [
    ...landmarks.map((entry) => entry.screenPoint),
    ...friends.map((entry) => entry.screenPoint),
  ];
  const bounds = boundsOfPoints(points, thresholdPixels);
  if (!bounds) {
    return [];
  }

  const tree = createPointQuadTree<ClusterEntry>({ bounds });
  landmarks.forEach((entry, index) => {
    tree.add({
      x: entry.screenPoint.x,
      y: entry.screenPoint.y,
      state: { kind: 'landmark', index },
    });
  });
  friends.forEach((entry, index) => {
    tree.add({
      x: entry.screenPoint.x,
      y: entry.screenPoint.y,
      state: { kind: 'friend', index },
    });
  });

  const assignedLandmarks = new Array<boolean>(landmarks.length).fill(false);
  const assignedFriends = new Array<boolean>(friends.length).fill(false);

  // Candidates come back in tree order; sort by input index to keep results deterministic.
  const neighbours = (anchor: ScreenPoint, kind: ClusterEntry['kind']) =>
    tree
      .lookup(
        anchor.x - thresholdPixels,
        anchor.y - thresholdPixels,
        anchor.x + thresholdPixels,
        anchor.y + thresholdPixels
      )
      .filter(
        (item) =>
          item.state.kind === kind &&
          pixelDistance(anchor, item) < thresholdPixels
      )
      .map((item) => item.state.index)
      .sort((a, b) => a - b);

  const clusters: EntityCluster[] = [];
  landmarks.forEach((seed, seedIndex) => {
    if (assignedLandmarks[seedIndex]) {
      return;
    }
    assignedLandmarks[seedIndex] = true;
    const anchor = seed.screenPoint;

    const members: ResolvedLandmark[] = [seed];
    for (const index of neighbours(anchor, 'landmark')) {
      if (!assignedLandmarks[index]) {
        assignedLandmarks[index] = true;
        members.push(landmarks[index]);
      }
    }

    const memberFriends: ResolvedFriend[] = [];
    for (const index of neighbours(anchor, 'friend')) {
      if (!assignedFriends[index]) {
        assignedFriends[index] = true;
        memberFriends.push(friends[index]);
      }
    }

    members.sort((a, b) => a.distanceMeters - b.distanceMeters);
    clusters.push(createEntityCluster(members, memberFriends, anchor));
  });

  return clusters;
};

//////////////////////////////////////////////////////////////////////////////////////

/**
 * Finds the cluster that absorbed a friend.
 */
export const findClusterContainingFriend = (
  clusters: readonly EntityCluster[],
  friendId: string
): EntityCluster | undefined =>
  clusters.find((cluster) =>
    cluster.friends.some((entry) => entry.friend.id === friendId)
  );

/**
 * Ids of every friend absorbed into a cluster. These are not drawn individually.
 */
export const collectClusteredFriendIds = (
  clusters: readonly EntityCluster[]
): Set<string> => {
  const ids = new Set<string>();
  for (const cluster of clusters) {
    for (const entry of cluster.friends) {
      ids.add(entry.friend.id);
    }
  }
  return ids;
};

/**
 * Whether a cluster's anchor has left the padded viewport. Expanded clusters
 * collapse once this turns true.
 */
export const isClusterOffScreen = (
  cluster: EntityCluster,
  viewport: ScreenSize,
  marginPixels: number = DEFAULT_OFF_SCREEN_MARGIN_PIXELS
): boolean => !isOnScreen(cluster.position, viewport, marginPixels);
