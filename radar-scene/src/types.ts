// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

/**
 * This file exposes public API definitions only.
 */

//////////////////////////////////////////////////////////////////////////////////////////

/**
 * Geographic coordinate.
 */
export interface GeoPoint {
  /** Latitude in degrees. */
  readonly latitude: number;
  /** Longitude in degrees. */
  readonly longitude: number;
}

/**
 * Unit direction in the North-West-Up world frame.
 * x points north, y points west, z points up.
 */
export interface WorldDirection {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * Row-major 3x3 rotation matrix mapping world (NWU) vectors into the device frame.
 * Device frame: x to the right of the screen, y up the screen, z out of the screen toward the viewer.
 */
export type DeviceOrientation = readonly [
  number,
  number,
  number,
  number,
  number,
  number,
  number,
  number,
  number,
];

/**
 * Point in screen space. Origin is the top-left corner, y grows downward.
 */
export interface ScreenPoint {
  readonly x: number;
  readonly y: number;
}

/**
 * Viewport size in pixels.
 */
export interface ScreenSize {
  readonly width: number;
  readonly height: number;
}

/**
 * Horizontal position of a celestial body.
 */
export interface HorizontalPosition {
  /** Azimuth in degrees, 0 = north, clockwise. */
  readonly azimuthDeg: number;
  /** Elevation in degrees above the horizon. */
  readonly elevationDeg: number;
}

/**
 * Moon phase band. `null` is used for the new moon, when nothing is drawn.
 */
export type MoonPhaseId =
  | 'crescent-waxing'
  | 'half-waxing'
  | 'full'
  | 'half-waning'
  | 'crescent-waning';

export type DistanceUnit = 'km' | 'mi';

//////////////////////////////////////////////////////////////////////////////////////////

/**
 * Last known location reported for a friend.
 */
export interface FriendLocation extends GeoPoint {
  /** Time the location was recorded. */
  readonly timestamp: Date;
}

/**
 * Friend entry as delivered by the roster sync.
 */
export interface Friend {
  readonly id: string;
  readonly displayName: string;
  readonly avatarRef?: string;
  readonly location?: FriendLocation;
}

/**
 * Static point of interest.
 */
export interface Landmark {
  readonly id: string;
  readonly name: string;
  /** Emoji or icon reference. */
  readonly icon: string;
  readonly coordinate: GeoPoint;
  readonly city: string;
  readonly country: string;
}

/**
 * User-controlled display flags relevant to the radar.
 */
export interface RadarSettings {
  /** Global landmark switch. */
  readonly showLandmarks: boolean;
  /** Landmarks the user has switched off individually. */
  readonly disabledLandmarkIds: ReadonlySet<string>;
}

//////////////////////////////////////////////////////////////////////////////////////////

/**
 * Radar configuration. Every field has a default, see {@link DEFAULT_RADAR_OPTIONS}.
 */
export interface RadarOptions {
  /** Total horizontal field of view in degrees. Defaults to 60. */
  readonly horizontalFovDeg: number;
  /** Total vertical field of view in degrees. Defaults to 90. */
  readonly verticalFovDeg: number;
  /** Friends whose location is older than this are hidden. Defaults to 300 seconds. */
  readonly friendStalenessSeconds: number;
  /** Pixel distance under which landmarks and friends merge. Defaults to 60. */
  readonly clusterThresholdPixels: number;
  /** Spherical earth radius in meters. Defaults to 6,371,000. */
  readonly earthRadiusMeters: number;
  /** Distance from the viewport centre at which a navigation target counts as found. Defaults to 150. */
  readonly targetFoundRadiusPixels: number;
  /** Padding around the viewport before a cluster counts as off-screen. Defaults to 50. */
  readonly clusterOffScreenMarginPixels: number;
  /** Azimuth step of the sampled horizon line in degrees. Defaults to 2. */
  readonly horizonSampleStepDeg: number;
  /** Iteration count of the earth-region edge bisection. Defaults to 20. */
  readonly horizonBisectionIterations: number;
  /** Sun elevation above which it counts as daytime. Defaults to -6 (civil twilight). */
  readonly twilightElevationDeg: number;
  /** First local hour counted as day when no location is known. Defaults to 6. */
  readonly fallbackDayStartHour: number;
  /** First local hour counted as night when no location is known. Defaults to 20. */
  readonly fallbackDayEndHour: number;
}

//////////////////////////////////////////////////////////////////////////////////////////

/**
 * Screen-resolved entity common fields.
 */
export interface ResolvedPlacement {
  /** Projected position, may lie outside the viewport. */
  readonly screenPoint: ScreenPoint;
  /** Great-circle distance from the observer in meters. */
  readonly distanceMeters: number;
  /** Initial bearing from the observer in degrees. */
  readonly bearingDeg: number;
  /** Whether the projected point lies inside the viewport. */
  readonly onScreen: boolean;
  /** Whether the bearing lies inside the horizontal field of view around the heading. */
  readonly inFieldOfView: boolean;
}

export interface ResolvedFriend extends ResolvedPlacement {
  readonly friend: Friend;
}

export interface ResolvedLandmark extends ResolvedPlacement {
  readonly landmark: Landmark;
}

/**
 * Sun or moon placement. Always computed, `screenPoint` is `null` when behind the device.
 */
export interface ResolvedCelestialBody {
  readonly position: HorizontalPosition;
  readonly screenPoint: ScreenPoint | null;
}

/**
 * Navigation target state.
 */
export interface ResolvedTarget {
  readonly friend: Friend;
  /** Unclamped projection, `null` when the target is behind the device. */
  readonly screenPoint: ScreenPoint | null;
  /** Relative bearing from the device heading, -180..180, positive to the right. */
  readonly arrowAngleDeg: number;
  readonly distanceMeters: number;
  /** Pixel distance from the viewport centre, `null` when not projected. */
  readonly distanceFromCenterPixels: number | null;
  /** The target is projected close enough to the centre. */
  readonly found: boolean;
  /** Whether the directional arrow should be shown. */
  readonly showArrow: boolean;
}

/**
 * Group of screen-proximate landmarks and friends sharing one anchor.
 */
export interface EntityCluster {
  /** Sorted landmark ids joined with `-`, suffixed by `+` and sorted friend ids when friends are present. */
  readonly id: string;
  /** Landmarks ordered by distance from the observer, closest first. */
  readonly landmarks: readonly ResolvedLandmark[];
  readonly friends: readonly ResolvedFriend[];
  /** Anchor (the seed landmark's position). */
  readonly position: ScreenPoint;
  /** One landmark and no friends: drawn as a plain icon. */
  readonly isSingle: boolean;
  /** Contains at least one friend. */
  readonly isMixed: boolean;
  readonly totalCount: number;
}

/**
 * Background star.
 */
export interface Star {
  /** Normalized horizontal position 0..1. */
  readonly x: number;
  /** Normalized vertical position 0..1. */
  readonly y: number;
  /** Radius in pixels. */
  readonly radius: number;
  readonly opacity: number;
}

/**
 * Star resolved to viewport pixels.
 */
export interface PlacedStar {
  readonly point: ScreenPoint;
  readonly radius: number;
  readonly opacity: number;
}

//////////////////////////////////////////////////////////////////////////////////////////

/**
 * Snapshot of everything a frame depends on.
 */
export interface RadarSceneInput {
  readonly instant: Date;
  readonly viewport: ScreenSize;
  /** Current world-to-device rotation, `null` until motion data is available. */
  readonly orientation: DeviceOrientation | null;
  /** Current observer position, `null` until a location fix is available. */
  readonly observer: GeoPoint | null;
  readonly friends: readonly Friend[];
  readonly landmarks: readonly Landmark[];
  readonly settings: RadarSettings;
  /** Friend the user is navigating toward. */
  readonly targetFriendId?: string;
  /** Caller's UTC offset, used by the day/night fallback. Defaults to the runtime's local offset. */
  readonly utcOffsetMinutes?: number;
}

/**
 * Read-only provider of frame snapshots.
 */
export interface RadarSnapshotSource {
  readonly readSnapshot: () => RadarSceneInput;
}

/**
 * Per-frame output consumed by the presentation layer.
 */
export interface RadarScene {
  /** Compass heading in degrees, `null` without orientation. */
  readonly headingDeg: number | null;
  readonly cardinal: string | null;
  readonly visibleFriends: readonly ResolvedFriend[];
  /** Visible friends not absorbed into a landmark cluster. */
  readonly individualFriends: readonly ResolvedFriend[];
  readonly landmarkClusters: readonly EntityCluster[];
  /** Ids of clusters whose anchor lies outside the viewport padded by `clusterOffScreenMarginPixels`. */
  readonly offScreenClusterIds: readonly string[];
  readonly clusteredFriendIds: readonly string[];
  readonly horizonPolyline: readonly ScreenPoint[];
  readonly earthRegion: readonly ScreenPoint[];
  readonly skyRegion: readonly ScreenPoint[];
  readonly isDaytime: boolean;
  /** Sun elevation in degrees, `null` without observer. */
  readonly sunElevationDeg: number | null;
  readonly sun: ResolvedCelestialBody | null;
  readonly moon: ResolvedCelestialBody | null;
  readonly sunScreenPoint: ScreenPoint | null;
  readonly moonScreenPoint: ScreenPoint | null;
  readonly moonPhaseId: MoonPhaseId | null;
  readonly stars: readonly PlacedStar[];
  readonly target: ResolvedTarget | null;
}
