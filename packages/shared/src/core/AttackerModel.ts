import { AttackerType } from '../enums/AttackerType';
import { AttackerTemplate } from './AttackerStats';
import { PathModel } from './PathModel';
import { Vector2 } from './Vector2';

export class AttackerModel {
  readonly id: number;
  readonly attackerType: AttackerType;
  health: number;
  maxHealth: number;
  movementSpeed: number;
  velocity: Vector2 = { x: 0, y: 0 };
  readonly size: Vector2;
  readonly bounty: number;
  readonly originalCost: number;
  readonly groupSize: number;
  position: Vector2;
  /** null = 경로 없음 (정지, 다음 길찾기 대기) */
  path: PathModel | null = null;

  constructor(id: number, template: Readonly<AttackerTemplate>, position: Vector2) {
    this.id = id;
    this.attackerType = template.attackerType;
    this.health = template.health;
    this.maxHealth = template.maxHealth;
    this.movementSpeed = template.movementSpeed;
    this.size = { ...template.size };
    this.bounty = template.bounty;
    this.originalCost = template.originalCost;
    this.groupSize = template.groupSize;
    this.position = { ...position };
  }

  get isAlive(): boolean {
    return this.health > 0;
  }

  /** 남은 체력 반환 */
  damage(amount: number): number {
    this.health -= amount;
    return this.health;
  }

  clearPath(): void {
    this.path = null;
    this.velocity = { x: 0, y: 0 };
  }
}
