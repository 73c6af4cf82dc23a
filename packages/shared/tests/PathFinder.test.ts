import { describe, expect, it } from 'vitest';
import { findPath, hasPath } from '../src/core/PathFinder';
import { DEFAULT_FIELD_DATA, TowerField } from '../src/core/TowerField';
import { gridNode, manhattanDistance } from '../src/core/GridNode';
import type { GridNode } from '../src/core/GridNode';

const smallField = (width: number, height: number, start: GridNode, end: GridNode): TowerField =>
  new TowerField({ width, height, start, end });

describe('findPath', () => {
  it('returns a Manhattan-length route on the default open field', () => {
    const field = new TowerField(DEFAULT_FIELD_DATA);
    const path = findPath(field, field.start, field.end);

    expect(path).not.toBeNull();
    expect(path?.stepCount()).toBe(27);
    expect(path?.size()).toBe(28);
    expect(path?.nodeAt(0)).toEqual({ x: 2, y: 0 });
    expect(path?.nodeAt(27)).toEqual({ x: 14, y: 15 });
  });

  it('produces 4-adjacent consecutive nodes', () => {
    const field = new TowerField(DEFAULT_FIELD_DATA);
    const nodes = findPath(field, field.start, field.end)?.nodes() ?? [];

    for (let i = 1; i < nodes.length; i++) {
      expect(manhattanDistance(nodes[i - 1], nodes[i])).toBe(1);
    }
  });

  it('walks around a blocked cell', () => {
    const field = smallField(3, 3, gridNode(0, 0), gridNode(2, 0));
    field.addStructure(gridNode(1, 0), 1, true);

    const path = findPath(field, field.start, field.end);

    expect(path?.nodes()).toEqual([
      { x: 0, y: 0 },
      { x: 0, y: 1 },
      { x: 1, y: 1 },
      { x: 2, y: 1 },
      { x: 2, y: 0 },
    ]);
  });

  it('treats the hypothetical cell as blocked without touching the field', () => {
    const field = smallField(3, 3, gridNode(0, 0), gridNode(2, 0));

    const path = findPath(field, field.start, field.end, gridNode(1, 0));

    expect(path?.stepCount()).toBe(4);
    expect(path?.nodes()).not.toContainEqual({ x: 1, y: 0 });
    expect(field.isBlocked(gridNode(1, 0))).toBe(false);
    expect(findPath(field, field.start, field.end)?.stepCount()).toBe(2);
  });

  it('returns null when a wall row separates start and end', () => {
    const field = smallField(5, 5, gridNode(0, 0), gridNode(4, 4));
    for (let x = 0; x < 5; x++) {
      field.addStructure(gridNode(x, 2), x + 1, true);
    }

    expect(findPath(field, field.start, field.end)).toBeNull();
    expect(hasPath(field, field.start, field.end)).toBe(false);
  });

  it('returns null when the only corridor cell is hypothetically blocked', () => {
    const field = smallField(3, 1, gridNode(0, 0), gridNode(2, 0));

    expect(findPath(field, field.start, field.end, gridNode(1, 0))).toBeNull();
  });

  it('rejects degenerate requests', () => {
    const field = smallField(4, 4, gridNode(0, 0), gridNode(3, 3));

    expect(findPath(field, field.start, field.start)).toBeNull();
    expect(findPath(field, field.start, field.end, field.start)).toBeNull();
    expect(findPath(field, field.start, field.end, field.end)).toBeNull();
    expect(findPath(field, gridNode(-1, 0), field.end)).toBeNull();
    expect(findPath(field, field.start, gridNode(4, 3))).toBeNull();
  });

  it('returns null when the start cell itself is blocked', () => {
    const field = smallField(4, 4, gridNode(0, 0), gridNode(3, 3));
    field.addStructure(gridNode(1, 1), 1, true);

    expect(findPath(field, gridNode(1, 1), field.end)).toBeNull();
  });

  it('ignores non-blocking structures', () => {
    const field = smallField(3, 1, gridNode(0, 0), gridNode(2, 0));
    field.addStructure(gridNode(1, 0), 1, false);

    expect(findPath(field, field.start, field.end)?.stepCount()).toBe(2);
  });

  it('is deterministic for identical inputs', () => {
    const field = new TowerField(DEFAULT_FIELD_DATA);
    field.addStructure(gridNode(5, 5), 1, true);
    field.addStructure(gridNode(6, 6), 2, true);

    const first = findPath(field, field.start, field.end)?.nodes();
    const second = findPath(field, field.start, field.end)?.nodes();

    expect(first).toEqual(second);
  });
});
