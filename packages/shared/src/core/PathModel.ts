import { GridNode } from './GridNode';
import { TowerField } from './TowerField';
import { Vector2 } from './Vector2';

/** 노드 경로 + 커서. 커서 이동 외에는 불변, 새 경로는 통째로 교체한다 */
export class PathModel {
  private readonly route: readonly GridNode[];
  private cursor: number = 0;

  constructor(route: readonly GridNode[]) {
    this.route = route.map(n => ({ x: n.x, y: n.y }));
  }

  /** "경로 없음" 센티널 */
  static empty(): PathModel {
    return new PathModel([]);
  }

  get isEmpty(): boolean {
    return this.route.length === 0;
  }

  size(): number {
    return this.route.length;
  }

  /** 이동 칸 수 (노드 수 - 1) */
  stepCount(): number {
    return Math.max(0, this.route.length - 1);
  }

  nodeAt(index: number): GridNode {
    const node = this.route[index];
    if (!node) {
      throw new RangeError(`Path index ${index} out of range (size ${this.route.length})`);
    }
    return node;
  }

  cursorIndex(): number {
    return this.cursor;
  }

  targetNode(): GridNode {
    return this.nodeAt(this.cursor);
  }

  targetPosition(): Vector2 {
    return TowerField.nodeToWorld(this.targetNode());
  }

  // 마지막 인덱스에서는 아무 것도 안 함
  advanceCursor(): void {
    if (this.cursor < this.route.length - 1) {
      this.cursor++;
    }
  }

  nodes(): GridNode[] {
    return this.route.map(n => ({ x: n.x, y: n.y }));
  }

  toString(): string {
    return this.route.map(n => `(${n.x},${n.y})`).join(' → ');
  }
}
