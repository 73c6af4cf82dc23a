import { AttackerType } from '../enums/AttackerType';
import { BuildingType } from '../enums/BuildingType';
import type { ProjectileTarget } from '../core/ProjectileModel';
import type { RoundStats } from '../core/ResourceStore';

export interface AttackerState {
  id: number;
  attackerType: AttackerType;
  x: number;
  y: number;
  health: number;
  maxHealth: number;
  /** 경로 커서가 가리키는 칸, 경로 없으면 null */
  waypoint: { x: number; y: number } | null;
}

export interface StructureState {
  id: number;
  buildingType: BuildingType;
  x: number;
  y: number;
  killCount: number;
}

export interface ProjectileState {
  id: number;
  sourceId: number;
  x: number;
  y: number;
  target: ProjectileTarget;
}

export interface GameState {
  tick: number;
  round: number;
  roundActive: boolean;
  pendingSpawns: AttackerType[];
  defenderGold: number;
  lives: number;
  attackerGold: number;
  escrowBounty: number;
  roundStats: RoundStats;
  attackers: AttackerState[];
  structures: StructureState[];
  projectiles: ProjectileState[];
}
