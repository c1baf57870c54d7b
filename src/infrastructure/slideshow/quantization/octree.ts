import type { Palette } from '@domain/slideshow/index.js';

import type { ColorEntry } from './color-histogram.js';

const MAX_DEPTH = 8;

class OctreeNode {
  public readonly children: (OctreeNode | null)[] = new Array<OctreeNode | null>(8).fill(null);

  public leaf = false;

  public red = 0;

  public green = 0;

  public blue = 0;

  public count = 0;

  public constructor(public readonly depth: number) {}
}

const childIndex = (color: number, depth: number): number => {
  const shift = 7 - depth;
  return (
    (((color >> (16 + shift)) & 1) << 2) |
    (((color >> (8 + shift)) & 1) << 1) |
    ((color >> shift) & 1)
  );
};

/**
 * Octree reduction over a colour histogram. Leaves sit at depth 8; while
 * there are too many, the deepest internal nodes fold their children into
 * themselves, most recently created first.
 */
export function octreePalette(entries: readonly ColorEntry[], maxColors: number): Palette {
  if (entries.length === 0) {
    return [];
  }

  const root = new OctreeNode(0);
  const reducible: OctreeNode[][] = Array.from({ length: MAX_DEPTH }, () => []);
  let leafCount = 0;

  for (const { color, count } of entries) {
    let node = root;

    for (let depth = 0; depth < MAX_DEPTH; depth += 1) {
      const index = childIndex(color, depth);
      let child = node.children[index];

      if (!child) {
        child = new OctreeNode(depth + 1);
        node.children[index] = child;
        if (depth + 1 === MAX_DEPTH) {
          child.leaf = true;
          leafCount += 1;
        } else {
          reducible[depth + 1]?.push(child);
        }
      }

      node = child;
    }

    node.red += ((color >> 16) & 0xff) * count;
    node.green += ((color >> 8) & 0xff) * count;
    node.blue += (color & 0xff) * count;
    node.count += count;
  }

  reducible[0]?.push(root);

  while (leafCount > maxColors) {
    const level = findDeepestReducibleLevel(reducible);
    const node = level === -1 ? undefined : reducible[level]?.pop();
    if (!node) {
      break;
    }

    leafCount -= reduce(node) - 1;
  }

  const palette: [number, number, number][] = [];
  collectLeaves(root, palette);
  return palette;
}

function findDeepestReducibleLevel(reducible: readonly OctreeNode[][]): number {
  for (let level = reducible.length - 1; level >= 0; level -= 1) {
    if ((reducible[level]?.length ?? 0) > 0) {
      return level;
    }
  }
  return -1;
}

/** Folds every child leaf into the node. Returns how many leaves were merged. */
function reduce(node: OctreeNode): number {
  let merged = 0;

  node.children.forEach((child, index) => {
    if (!child) {
      return;
    }
    node.red += child.red;
    node.green += child.green;
    node.blue += child.blue;
    node.count += child.count;
    node.children[index] = null;
    merged += 1;
  });

  node.leaf = true;
  return merged;
}

function collectLeaves(node: OctreeNode, palette: [number, number, number][]): void {
  if (node.leaf) {
    if (node.count > 0) {
      palette.push([
        Math.round(node.red / node.count),
        Math.round(node.green / node.count),
        Math.round(node.blue / node.count),
      ]);
    }
    return;
  }

  for (const child of node.children) {
    if (child) {
      collectLeaves(child, palette);
    }
  }
}
