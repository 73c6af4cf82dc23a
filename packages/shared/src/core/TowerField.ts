import { GridNode, gridNode } from './GridNode';
import { Vector2 } from './Vector2';

/** 한 칸의 월드 크기 */
export const SLOT_SIZE = 64;

export interface FieldSlot {
  structureId: number | null;
  /** 길찾기를 막는지 */
  blocked: boolean;
  /** 막지 않는 구조물이라도 있으면 true */
  occupied: boolean;
}

export interface FieldData {
  width: number;
  height: number;
  start: GridNode;
  end: GridNode;
}

export class TowerField {
  readonly width: number;
  readonly height: number;
  readonly start: GridNode;
  readonly end: GridNode;
  private slots: FieldSlot[];

  constructor(data: FieldData) {
    if (data.width <= 0 || data.height <= 0) {
      throw new Error(`Invalid field size: ${data.width}x${data.height}`);
    }
    this.width = data.width;
    this.height = data.height;
    this.start = gridNode(data.start.x, data.start.y);
    this.end = gridNode(data.end.x, data.end.y);
    if (!this.isInside(this.start) || !this.isInside(this.end)) {
      throw new Error('Start and end cells must lie inside the field');
    }

    this.slots = [];
    for (let i = 0; i < this.width * this.height; i++) {
      this.slots.push({ structureId: null, blocked: false, occupied: false });
    }
  }

  isInside(node: GridNode): boolean {
    return node.x >= 0 && node.x < this.width && node.y >= 0 && node.y < this.height;
  }

  getSlot(node: GridNode): Readonly<FieldSlot> | undefined {
    if (!this.isInside(node)) return undefined;
    return this.slots[node.x + node.y * this.width];
  }

  // 필드 밖은 막힌 것으로 취급
  isBlocked(node: GridNode): boolean {
    return this.getSlot(node)?.blocked ?? true;
  }

  isOccupied(node: GridNode): boolean {
    return this.getSlot(node)?.occupied ?? true;
  }

  isPathable(node: GridNode): boolean {
    return !this.isBlocked(node);
  }

  addStructure(node: GridNode, structureId: number, blocking: boolean): boolean {
    if (!this.isInside(node)) return false;
    this.slots[node.x + node.y * this.width] = { structureId, blocked: blocking, occupied: true };
    return true;
  }

  clearSlot(node: GridNode): boolean {
    if (!this.isInside(node)) return false;
    this.slots[node.x + node.y * this.width] = { structureId: null, blocked: false, occupied: false };
    return true;
  }

  isStartOrEnd(node: GridNode): boolean {
    return (node.x === this.start.x && node.y === this.start.y) ||
      (node.x === this.end.x && node.y === this.end.y);
  }

  /** 셀 좌하단 기준 월드 좌표 */
  static nodeToWorld(node: GridNode): Vector2 {
    return { x: node.x * SLOT_SIZE, y: node.y * SLOT_SIZE };
  }

  static worldToNode(position: Vector2): GridNode {
    return gridNode(Math.trunc(position.x / SLOT_SIZE), Math.trunc(position.y / SLOT_SIZE));
  }

  get startPosition(): Vector2 {
    return TowerField.nodeToWorld(this.start);
  }

  get endPosition(): Vector2 {
    return TowerField.nodeToWorld(this.end);
  }
}

export const DEFAULT_FIELD_DATA: FieldData = {
  width: 16,
  height: 16,
  start: { x: 2, y: 0 },
  end: { x: 14, y: 15 },
};
