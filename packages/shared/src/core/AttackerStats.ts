import attackerDefinitions from '../../data/attackers.json';
import { ALL_ATTACKER_TYPES, AttackerType } from '../enums/AttackerType';
import { UpgradeEffectType, UpgradeType } from '../enums/UpgradeType';
import { Vector2 } from './Vector2';
import { isRecord, requireEnum, requireNumber, requireString, requireVector } from './validation';

export interface AttackerTemplate {
  attackerType: AttackerType;
  name: string;
  health: number;
  maxHealth: number;
  movementSpeed: number;
  size: Vector2;
  bounty: number;
  originalCost: number;
  /** 한 번에 소환되는 수. 처치 시 비용 환급을 나눌 때 사용 */
  groupSize: number;
}

export interface UpgradeInfo {
  effect: number;
  cost: number;
  effectType: UpgradeEffectType;
  description: string;
}

const UPGRADE_COST_GROWTH = 1.3;

function applyUpgradeValue(info: UpgradeInfo, current: number): number {
  return info.effectType === UpgradeEffectType.Factor ? current * info.effect : current + info.effect;
}

function applyUpgradeInt(info: UpgradeInfo, current: number): number {
  return info.effectType === UpgradeEffectType.Factor
    ? Math.round(current * info.effect)
    : current + Math.trunc(info.effect);
}

/** 공격 유닛 기본 능력치 + 업그레이드 테이블. 업그레이드는 이후 소환분부터 적용 */
export class AttackerStats {
  private stats: Map<AttackerType, AttackerTemplate> = new Map();
  private upgrades: Map<string, UpgradeInfo> = new Map();

  constructor(templates: AttackerTemplate[], upgrades: Array<UpgradeInfo & { attackerType: AttackerType; upgradeType: UpgradeType }>) {
    for (const t of templates) {
      this.stats.set(t.attackerType, { ...t, size: { ...t.size } });
    }
    for (const u of upgrades) {
      this.upgrades.set(AttackerStats.upgradeKey(u.attackerType, u.upgradeType), {
        effect: u.effect,
        cost: u.cost,
        effectType: u.effectType,
        description: u.description,
      });
    }

    for (const type of ALL_ATTACKER_TYPES) {
      if (!this.stats.has(type)) throw new Error(`Attacker stats missing: ${type}`);
      for (const upgrade of Object.values(UpgradeType)) {
        if (!this.upgrades.has(AttackerStats.upgradeKey(type, upgrade))) {
          throw new Error(`Attacker upgrade missing: ${type}/${upgrade}`);
        }
      }
    }
  }

  private static upgradeKey(type: AttackerType, upgrade: UpgradeType): string {
    return `${type}:${upgrade}`;
  }

  getStats(type: AttackerType): Readonly<AttackerTemplate> {
    const stats = this.stats.get(type);
    if (!stats) throw new Error(`Attacker stats missing: ${type}`);
    return stats;
  }

  getCost(type: AttackerType): number {
    return this.getStats(type).originalCost;
  }

  getUpgrade(type: AttackerType, upgrade: UpgradeType): Readonly<UpgradeInfo> {
    const info = this.upgrades.get(AttackerStats.upgradeKey(type, upgrade));
    if (!info) throw new Error(`Attacker upgrade missing: ${type}/${upgrade}`);
    return info;
  }

  getUpgradeCost(type: AttackerType, upgrade: UpgradeType): number {
    return this.getUpgrade(type, upgrade).cost;
  }

  /** 업그레이드 적용 후 다음 비용은 30% 증가 */
  applyUpgrade(type: AttackerType, upgrade: UpgradeType): void {
    const stats = this.stats.get(type);
    const info = this.upgrades.get(AttackerStats.upgradeKey(type, upgrade));
    if (!stats || !info) throw new Error(`Attacker upgrade missing: ${type}/${upgrade}`);

    switch (upgrade) {
      case UpgradeType.Amount:
        stats.groupSize = applyUpgradeInt(info, stats.groupSize);
        break;
      case UpgradeType.Speed:
        stats.movementSpeed = applyUpgradeValue(info, stats.movementSpeed);
        break;
      case UpgradeType.Health:
        stats.maxHealth = applyUpgradeValue(info, stats.maxHealth);
        stats.health = applyUpgradeValue(info, stats.health);
        break;
    }
    info.cost = Math.round(info.cost * UPGRADE_COST_GROWTH);
  }
}

export function parseAttackerDefinitions(raw: unknown): AttackerStats {
  if (!isRecord(raw) || !Array.isArray(raw.attackers) || !Array.isArray(raw.upgrades)) {
    throw new Error('Attacker definitions must contain "attackers" and "upgrades" arrays');
  }

  const templates: AttackerTemplate[] = raw.attackers.map((entry: unknown, i: number) => {
    const context = `attackers[${i}]`;
    if (!isRecord(entry)) throw new Error(`${context}: expected an object`);
    const health = requireNumber(entry, 'health', context);
    return {
      attackerType: requireEnum(AttackerType, entry, 'attackerType', context),
      name: requireString(entry, 'name', context),
      health,
      maxHealth: health,
      movementSpeed: requireNumber(entry, 'movementSpeed', context),
      size: requireVector(entry, 'size', context),
      bounty: requireNumber(entry, 'bounty', context),
      originalCost: requireNumber(entry, 'originalCost', context),
      groupSize: requireNumber(entry, 'groupSize', context),
    };
  });

  const upgrades = raw.upgrades.map((entry: unknown, i: number) => {
    const context = `upgrades[${i}]`;
    if (!isRecord(entry)) throw new Error(`${context}: expected an object`);
    return {
      attackerType: requireEnum(AttackerType, entry, 'attackerType', context),
      upgradeType: requireEnum(UpgradeType, entry, 'upgradeType', context),
      effect: requireNumber(entry, 'effect', context),
      cost: requireNumber(entry, 'cost', context),
      effectType: requireEnum(UpgradeEffectType, entry, 'effectType', context),
      description: requireString(entry, 'description', context),
    };
  });

  return new AttackerStats(templates, upgrades);
}

/** 세션마다 새 인스턴스 (업그레이드가 템플릿을 변경하므로) */
export function createAttackerStats(): AttackerStats {
  return parseAttackerDefinitions(attackerDefinitions);
}
