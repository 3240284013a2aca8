// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

const DEFAULT_MAX_ITEMS_PER_NODE = 8;
const DEFAULT_MAX_DEPTH = 12;

/////////////////////////////////////////////////////////////////////////////////

export interface Rect {
  readonly x0: number;
  readonly y0: number;
  readonly x1: number;
  readonly y1: number;
}

export interface PointItem<TState> {
  readonly x: number;
  readonly y: number;
  readonly state: TState;
}

export interface PointQuadTree<TState> {
  readonly size: number;
  readonly add: (item: PointItem<TState>) => void;
  readonly lookup: (
    x0: number,
    y0: number,
    x1: number,
    y1: number
  ) => PointItem<TState>[];
  readonly clear: () => void;
}

/////////////////////////////////////////////////////////////////////////////////

interface QuadNode<TState> {
  readonly bounds: Rect;
  items: PointItem<TState>[];
  children: QuadNode<TState>[] | null;
  readonly depth: number;
}

/////////////////////////////////////////////////////////////////////////////////

const createNode = <TState>(bounds: Rect, depth: number): QuadNode<TState> => ({
  bounds,
  items: [],
  children: null,
  depth,
});

const normalizeRect = (rect: Rect): Rect => {
  const x0 = Math.min(rect.x0, rect.x1);
  const y0 = Math.min(rect.y0, rect.y1);
  const x1 = Math.max(rect.x0, rect.x1);
  const y1 = Math.max(rect.y0, rect.y1);
  return { x0, y0, x1, y1 };
};

const isFiniteRect = (rect: Rect): boolean =>
  Number.isFinite(rect.x0) &&
  Number.isFinite(rect.y0) &&
  Number.isFinite(rect.x1) &&
  Number.isFinite(rect.y1);

const rectContainsPoint = (rect: Rect, x: number, y: number): boolean =>
  rect.x0 <= x && x <= rect.x1 && rect.y0 <= y && y <= rect.y1;

const rectsOverlapInclusive = (a: Rect, b: Rect): boolean =>
  !(a.x1 < b.x0 || a.x0 > b.x1 || a.y1 < b.y0 || a.y0 > b.y1);

/////////////////////////////////////////////////////////////////////////////////

export interface PointQuadTreeOptions {
  readonly bounds: Rect;
  readonly maxItemsPerNode?: number;
  readonly maxDepth?: number;
}

/**
 * Creates a region quadtree over points. Points on a split line go to the
 * lower-index quadrant (west before east, north before south).
 * @param options Tree bounds and split limits.
 * @returns Point index.
 */
export const createPointQuadTree = <TState>(
  options: PointQuadTreeOptions
): PointQuadTree<TState> => {
  const maxItemsPerNode = options.maxItemsPerNode ?? DEFAULT_MAX_ITEMS_PER_NODE;
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

  if (maxItemsPerNode <= 0) {
    throw new Error('maxItemsPerNode must be greater than 0.');
  }
  if (maxDepth < 0) {
    throw new Error('maxDepth must be 0 or greater.');
  }

  const normalizedBounds = normalizeRect(options.bounds);
  if (!isFiniteRect(normalizedBounds)) {
    throw new Error('Bounds must have finite coordinates.');
  }

  let root: QuadNode<TState> = createNode(normalizedBounds, 0);
  let count = 0;

  //////////////////////////////////////////////////////////////////

  const childIndexOf = (node: QuadNode<TState>, x: number, y: number) => {
    const midX = (node.bounds.x0 + node.bounds.x1) / 2;
    const midY = (node.bounds.y0 + node.bounds.y1) / 2;
    return (x <= midX ? 0 : 1) + (y <= midY ? 0 : 2);
  };

  const subdivide = (node: QuadNode<TState>): void => {
    const { x0, y0, x1, y1 } = node.bounds;
    const midX = (x0 + x1) / 2;
    const midY = (y0 + y1) / 2;
    const depth = node.depth + 1;
    const children = [
      createNode<TState>({ x0, y0, x1: midX, y1: midY }, depth),
      createNode<TState>({ x0: midX, y0, x1, y1: midY }, depth),
      createNode<TState>({ x0, y0: midY, x1: midX, y1 }, depth),
      createNode<TState>({ x0: midX, y0: midY, x1, y1 }, depth),
    ];
    node.children = children;

    const pending = node.items;
    node.items = [];
    for (const item of pending) {
      children[childIndexOf(node, item.x, item.y)].items.push(item);
    }
  };

  const insertIntoNode = (
    node: QuadNode<TState>,
    item: PointItem<TState>
  ): void => {
    let current = node;
    while (current.children) {
      current = current.children[childIndexOf(current, item.x, item.y)];
    }
    current.items.push(item);
    if (current.items.length > maxItemsPerNode && current.depth < maxDepth) {
      subdivide(current);
    }
  };

  const collectFromNode = (
    node: QuadNode<TState>,
    range: Rect,
    results: PointItem<TState>[]
  ): void => {
    if (!rectsOverlapInclusive(node.bounds, range)) {
      return;
    }
    for (const item of node.items) {
      if (rectContainsPoint(range, item.x, item.y)) {
        results.push(item);
      }
    }
    if (node.children) {
      for (const child of node.children) {
        collectFromNode(child, range, results);
      }
    }
  };

  //////////////////////////////////////////////////////////////////

  const add = (item: PointItem<TState>): void => {
    if (!rectContainsPoint(root.bounds, item.x, item.y)) {
      throw new Error('Point is outside of quadtree bounds.');
    }
    insertIntoNode(root, item);
    count += 1;
  };

  const lookup = (
    x0: number,
    y0: number,
    x1: number,
    y1: number
  ): PointItem<TState>[] => {
    const results: PointItem<TState>[] = [];
    collectFromNode(root, normalizeRect({ x0, y0, x1, y1 }), results);
    return results;
  };

  const clear = (): void => {
    root = createNode(normalizedBounds, 0);
    count = 0;
  };

  return {
    get size() {
      return count;
    },
    add,
    lookup,
    clear,
  };
};

/**
 * Bounding rectangle of a point set, padded on every side.
 * @returns `null` for an empty set.
 */
export const boundsOfPoints = (
  points: readonly { readonly x: number; readonly y: number }[],
  padding = 0
): Rect | null => {
  if (points.length === 0) {
    return null;
  }
  let x0 = Number.POSITIVE_INFINITY;
  let y0 = Number.POSITIVE_INFINITY;
  let x1 = Number.NEGATIVE_INFINITY;
  let y1 = Number.NEGATIVE_INFINITY;
  for (const point of points) {
    x0 = Math.min(x0, point.x);
    y0 = Math.min(y0, point.y);
    x1 = Math.max(x1, point.x);
    y1 = Math.max(y1, point.y);
  }
  return {
    x0: x0 - padding,
    y0: y0 - padding,
    x1: x1 + padding,
    y1: y1 + padding,
  };
};
