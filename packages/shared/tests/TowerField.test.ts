import { describe, expect, it } from 'vitest';
import { DEFAULT_FIELD_DATA, TowerField } from '../src/core/TowerField';
import { gridNode } from '../src/core/GridNode';

describe('TowerField', () => {
  it('reports cells outside the field as blocked and occupied', () => {
    const field = new TowerField(DEFAULT_FIELD_DATA);

    expect(field.isBlocked(gridNode(-1, 0))).toBe(true);
    expect(field.isOccupied(gridNode(16, 3))).toBe(true);
    expect(field.isPathable(gridNode(0, 16))).toBe(false);
    expect(field.getSlot(gridNode(0, -1))).toBeUndefined();
  });

  it('does not wrap row overflow into the next row', () => {
    const field = new TowerField(DEFAULT_FIELD_DATA);
    field.addStructure(gridNode(0, 1), 7, true);

    expect(field.isBlocked(gridNode(16, 0))).toBe(true);
    expect(field.getSlot(gridNode(16, 0))).toBeUndefined();
  });

  it('places and clears structures', () => {
    const field = new TowerField(DEFAULT_FIELD_DATA);
    const node = gridNode(4, 5);

    expect(field.addStructure(node, 3, false)).toBe(true);
    expect(field.getSlot(node)).toEqual({ structureId: 3, blocked: false, occupied: true });
    expect(field.isPathable(node)).toBe(true);

    expect(field.clearSlot(node)).toBe(true);
    expect(field.getSlot(node)).toEqual({ structureId: null, blocked: false, occupied: false });
    expect(field.addStructure(gridNode(-2, 0), 4, true)).toBe(false);
  });

  it('converts between grid and world coordinates', () => {
    expect(TowerField.nodeToWorld(gridNode(2, 3))).toEqual({ x: 128, y: 192 });
    expect(TowerField.worldToNode({ x: 130.5, y: 63.9 })).toEqual({ x: 2, y: 0 });

    const field = new TowerField(DEFAULT_FIELD_DATA);
    expect(field.startPosition).toEqual({ x: 128, y: 0 });
    expect(field.endPosition).toEqual({ x: 896, y: 960 });
    expect(field.isStartOrEnd(gridNode(14, 15))).toBe(true);
  });

  it('rejects invalid dimensions and endpoints', () => {
    expect(() => new TowerField({ width: 0, height: 4, start: gridNode(0, 0), end: gridNode(0, 1) }))
      .toThrow('Invalid field size: 0x4');
    expect(() => new TowerField({ width: 4, height: 4, start: gridNode(0, 0), end: gridNode(4, 0) }))
      .toThrow('Start and end cells must lie inside the field');
  });
});
