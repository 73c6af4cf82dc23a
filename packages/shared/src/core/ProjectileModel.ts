import { DamageType } from '../enums/DamageType';
import { Vector2 } from './Vector2';

/** 특정 유닛을 쫓거나 고정 지점을 향함 */
export type ProjectileTarget =
  | { kind: 'attacker'; attackerId: number }
  | { kind: 'ground'; position: Vector2 };

export type ProjectileMotion =
  | { kind: 'velocity'; speed: number }
  | { kind: 'fixed'; duration: number; startPosition: Vector2 }
  | { kind: 'fixedArc'; duration: number; arcHeight: number; startPosition: Vector2 };

export const PROJECTILE_MAX_AGE = 20;

export interface ProjectileInit {
  target: ProjectileTarget;
  sourceId: number;
  motion: ProjectileMotion;
  damage: number;
  damageType: DamageType;
  splashRadius: number;
  size: Vector2;
  position: Vector2;
}

export class ProjectileModel {
  readonly id: number;
  target: ProjectileTarget;
  readonly sourceId: number;
  readonly motion: ProjectileMotion;
  readonly damage: number;
  readonly damageType: DamageType;
  readonly splashRadius: number;
  readonly size: Vector2;
  position: Vector2;
  velocity: Vector2 = { x: 0, y: 0 };
  /** 초 */
  age: number = 0;
  /** 제거 예정 */
  dead: boolean = false;

  constructor(id: number, init: ProjectileInit) {
    this.id = id;
    this.target = init.target;
    this.sourceId = init.sourceId;
    this.motion = init.motion;
    this.damage = init.damage;
    this.damageType = init.damageType;
    this.splashRadius = init.splashRadius;
    this.size = { ...init.size };
    this.position = { ...init.position };
  }

  /** 타겟 유닛이 먼저 죽으면 사망 위치를 향하는 지면 타겟으로 전환 */
  retargetToGround(position: Vector2): void {
    this.target = { kind: 'ground', position: { ...position } };
  }
}
