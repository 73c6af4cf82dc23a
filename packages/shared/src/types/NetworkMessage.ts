import { AttackerType } from '../enums/AttackerType';
import { BuildingType } from '../enums/BuildingType';
import { UpgradeType } from '../enums/UpgradeType';
import type { BuildingDefinition } from '../core/BuildingRegistry';
import type { SimulationEvent } from '../core/SimulationEvents';
import type { FieldData } from '../core/TowerField';
import type { GameState } from './GameState';

// ─── 클라이언트 → 서버 ───────────────────────────────────────────

export interface QueueAttackerMsg {
  attackerType: AttackerType;
}

export interface UpgradeAttackerMsg {
  attackerType: AttackerType;
  upgradeType: UpgradeType;
}

export interface PlaceStructureMsg {
  x: number;
  y: number;
  buildingType: BuildingType;
}

export interface RemoveStructureMsg {
  x: number;
  y: number;
}

export interface SetSpeedMsg {
  speed: number;  // 0.4 ~ 4.0 으로 보정됨
}

// ─── 서버 → 클라이언트 ───────────────────────────────────────────

export interface SessionStartedMsg {
  sessionId: string;
  field: FieldData;
  slotSize: number;
  buildings: BuildingDefinition[];
  state: GameState;
}

export interface ActionRejectedMsg {
  action: string;
  reason: string;
}

export interface SpeedChangedMsg {
  speed: number;
}

export type StateSnapshotMsg = GameState;

/** 시뮬레이션 이벤트는 type 필드를 이벤트 이름으로 그대로 전송 */
export type SimulationEventMsg = SimulationEvent;

// ─── Socket.io 이벤트 이름 상수 ──────────────────────────────────

export const SocketEvent = {
  // C → S
  QUEUE_ATTACKER: 'queueAttacker',
  START_ROUND: 'startRound',
  UPGRADE_ATTACKER: 'upgradeAttacker',
  PLACE_STRUCTURE: 'placeStructure',
  REMOVE_STRUCTURE: 'removeStructure',
  SET_SPEED: 'setSpeed',

  // S → C
  SESSION_STARTED: 'sessionStarted',
  STATE_SNAPSHOT: 'stateSnapshot',
  ACTION_REJECTED: 'actionRejected',
  SPEED_CHANGED: 'speedChanged',
  DAMAGE: 'damage',
  KILL: 'kill',
  REACHED_END: 'reachedEnd',
  FIELD_MODIFIED: 'fieldModified',
  ROUND_STARTED: 'roundStarted',
  ROUND_OVER: 'roundOver',
  STRUCTURE_PLACED: 'structurePlaced',
  STRUCTURE_REMOVED: 'structureRemoved',
  ATTACKER_SPAWNED: 'attackerSpawned',
  PROJECTILE_FIRED: 'projectileFired',
  PROJECTILE_EXPIRED: 'projectileExpired',
} as const;
