import buildingDefinitions from '../../data/buildings.json';
import { ALL_BUILDING_TYPES, BuildingType } from '../enums/BuildingType';
import { DamageType } from '../enums/DamageType';
import { Vector2 } from './Vector2';
import {
  isRecord,
  requireBoolean,
  requireEnum,
  requireNumber,
  requireRecord,
  requireString,
  requireVector,
} from './validation';

export interface ProjectileAttack {
  kind: 'projectile';
  damageType: DamageType;
  damage: number;
  projectileSpeed: number;
  size: Vector2;
}

export interface SplashAttack {
  kind: 'splash';
  damageType: DamageType;
  damage: number;
  /** 발사 후 착탄까지 걸리는 시간 (초) */
  travelTime: number;
  splashRadius: number;
  size: Vector2;
}

export type DefenderAttack = ProjectileAttack | SplashAttack;

interface BuildingDefinitionBase {
  buildingType: BuildingType;
  cost: number;
  blocking: boolean;
}

export interface WallDefinition extends BuildingDefinitionBase {
  kind: 'wall';
}

export interface DefenderDefinition extends BuildingDefinitionBase {
  kind: 'defender';
  /** 공격 주기 (초) */
  attackTimer: number;
  attackRange: number;
  attack: DefenderAttack;
}

export type BuildingDefinition = WallDefinition | DefenderDefinition;

export class BuildingRegistry {
  private definitions: Map<BuildingType, BuildingDefinition>;

  constructor(definitions: BuildingDefinition[]) {
    this.definitions = new Map();
    for (const def of definitions) {
      this.definitions.set(def.buildingType, def);
    }
    for (const type of ALL_BUILDING_TYPES) {
      if (!this.definitions.has(type)) {
        throw new Error(`Building definition missing: ${type}`);
      }
    }
  }

  get(type: BuildingType): BuildingDefinition {
    const def = this.definitions.get(type);
    if (!def) throw new Error(`Building definition missing: ${type}`);
    return def;
  }

  getCost(type: BuildingType): number {
    return this.get(type).cost;
  }

  isBlocking(type: BuildingType): boolean {
    return this.get(type).blocking;
  }

  getDamage(type: BuildingType): number {
    const def = this.get(type);
    return def.kind === 'defender' ? def.attack.damage : 0;
  }

  getDps(type: BuildingType): number {
    const def = this.get(type);
    return def.kind === 'defender' ? def.attack.damage / def.attackTimer : 0;
  }

  isAoe(type: BuildingType): boolean {
    const def = this.get(type);
    return def.kind === 'defender' && def.attack.kind === 'splash';
  }

  all(): BuildingDefinition[] {
    return ALL_BUILDING_TYPES.map(type => this.get(type));
  }
}

function parseAttack(raw: Record<string, unknown>, context: string): DefenderAttack {
  const kind = requireString(raw, 'kind', context);
  const damageType = requireEnum(DamageType, raw, 'damageType', context);
  const damage = requireNumber(raw, 'damage', context);
  const size = requireVector(raw, 'size', context);
  if (kind === 'projectile') {
    return { kind, damageType, damage, size, projectileSpeed: requireNumber(raw, 'projectileSpeed', context) };
  }
  if (kind === 'splash') {
    return {
      kind,
      damageType,
      damage,
      size,
      travelTime: requireNumber(raw, 'travelTime', context),
      splashRadius: requireNumber(raw, 'splashRadius', context),
    };
  }
  throw new Error(`${context}: unknown attack kind "${kind}"`);
}

function parseDefinition(raw: unknown, index: number): BuildingDefinition {
  const context = `buildings[${index}]`;
  if (!isRecord(raw)) throw new Error(`${context}: expected an object`);

  const buildingType = requireEnum(BuildingType, raw, 'buildingType', context);
  const cost = requireNumber(raw, 'cost', context);
  const blocking = requireBoolean(raw, 'blocking', context);
  const kind = requireString(raw, 'kind', context);

  if (kind === 'wall') {
    return { kind, buildingType, cost, blocking };
  }
  if (kind === 'defender') {
    const attackTimer = requireNumber(raw, 'attackTimer', context);
    if (attackTimer <= 0) throw new Error(`${context}: "attackTimer" must be positive`);
    return {
      kind,
      buildingType,
      cost,
      blocking,
      attackTimer,
      attackRange: requireNumber(raw, 'attackRange', context),
      attack: parseAttack(requireRecord(raw, 'attack', context), `${context}.attack`),
    };
  }
  throw new Error(`${context}: unknown building kind "${kind}"`);
}

/** 시작 시 한 번 로드. 누락/손상된 항목이 있으면 throw */
export function parseBuildingDefinitions(raw: unknown): BuildingRegistry {
  if (!Array.isArray(raw)) throw new Error('Building definitions must be an array');
  return new BuildingRegistry(raw.map((entry, i) => parseDefinition(entry, i)));
}

export function createBuildingRegistry(): BuildingRegistry {
  return parseBuildingDefinitions(buildingDefinitions);
}
