import { AttackerType } from '../enums/AttackerType';
import { BuildingType } from '../enums/BuildingType';
import { DamageType } from '../enums/DamageType';
import { GridNode } from './GridNode';
import { ProjectileTarget } from './ProjectileModel';
import { RoundStats } from './ResourceStore';
import { Vector2 } from './Vector2';

export interface DamageEvent {
  type: 'damage';
  attackerId: number;
  amount: number;
  damageType: DamageType;
  sourceId: number;
}

export interface KillEvent {
  type: 'kill';
  attackerId: number;
  attackerType: AttackerType;
  bounty: number;
  originalCost: number;
  groupSize: number;
  position: Vector2;
  sourceId: number;
}

export interface ReachedEndEvent {
  type: 'reachedEnd';
  attackerId: number;
  bounty: number;
}

export interface FieldModifiedEvent {
  type: 'fieldModified';
}

export interface RoundStartedEvent {
  type: 'roundStarted';
  round: number;
}

export interface RoundOverEvent {
  type: 'roundOver';
  round: number;
  stats: RoundStats;
  escrowPaid: number;
}

export interface StructurePlacedEvent {
  type: 'structurePlaced';
  structureId: number;
  buildingType: BuildingType;
  node: GridNode;
}

export interface StructureRemovedEvent {
  type: 'structureRemoved';
  structureId: number;
  buildingType: BuildingType;
  node: GridNode;
  refund: number;
}

export interface AttackerSpawnedEvent {
  type: 'attackerSpawned';
  attackerId: number;
  attackerType: AttackerType;
  position: Vector2;
}

export interface ProjectileFiredEvent {
  type: 'projectileFired';
  projectileId: number;
  sourceId: number;
  target: ProjectileTarget;
}

export interface ProjectileExpiredEvent {
  type: 'projectileExpired';
  projectileId: number;
}

export type SimulationEvent =
  | DamageEvent
  | KillEvent
  | ReachedEndEvent
  | FieldModifiedEvent
  | RoundStartedEvent
  | RoundOverEvent
  | StructurePlacedEvent
  | StructureRemovedEvent
  | AttackerSpawnedEvent
  | ProjectileFiredEvent
  | ProjectileExpiredEvent;

export type SimulationEventType = SimulationEvent['type'];

/** 틱 단위 이벤트 목록. 틱 시작 시 비우고, 구독자에게는 즉시 전달 */
export class EventLog {
  private events: SimulationEvent[] = [];
  listener?: (event: SimulationEvent) => void;

  emit(event: SimulationEvent): void {
    this.events.push(event);
    this.listener?.(event);
  }

  clear(): void {
    this.events = [];
  }

  all(): readonly SimulationEvent[] {
    return this.events;
  }

  ofType<T extends SimulationEventType>(type: T): Extract<SimulationEvent, { type: T }>[] {
    return this.events.filter((e): e is Extract<SimulationEvent, { type: T }> => e.type === type);
  }
}
