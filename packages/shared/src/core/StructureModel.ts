import { BuildingType } from '../enums/BuildingType';
import { BuildingDefinition, DefenderAttack } from './BuildingRegistry';
import { GridNode } from './GridNode';
import { RepeatingTimer } from './RepeatingTimer';
import { TowerField } from './TowerField';
import { Vector2 } from './Vector2';

/** 공격형 구조물의 타워 동작 */
export class DefenderComponent {
  readonly attackTimer: RepeatingTimer;
  readonly attack: DefenderAttack;
  readonly attackRange: number;
  killCount: number = 0;
  /** 쿨다운 만료 후 타겟을 정할 때까지 true */
  pendingAttack: boolean = false;

  constructor(attackTimer: number, attack: DefenderAttack, attackRange: number) {
    this.attackTimer = new RepeatingTimer(attackTimer);
    this.attack = attack;
    this.attackRange = attackRange;
  }
}

export class StructureModel {
  readonly id: number;
  readonly buildingType: BuildingType;
  readonly blocking: boolean;
  readonly node: GridNode;
  readonly defender: DefenderComponent | null;

  constructor(id: number, definition: BuildingDefinition, node: GridNode) {
    this.id = id;
    this.buildingType = definition.buildingType;
    this.blocking = definition.blocking;
    this.node = { x: node.x, y: node.y };
    this.defender = definition.kind === 'defender'
      ? new DefenderComponent(definition.attackTimer, definition.attack, definition.attackRange)
      : null;
  }

  get position(): Vector2 {
    return TowerField.nodeToWorld(this.node);
  }
}
