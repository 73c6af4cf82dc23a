import {
  BuildingType,
  RepeatingTimer,
  TowerDefenseSimulator,
  vectorDistance,
} from '@tower-siege/shared';
import type { SimulationEvent } from '@tower-siege/shared';
import { DefenderPlanner } from './DefenderPlanner';

// ── 타입 정의 ────────────────────────────────────────────────────────────────

export interface DefenderAIConfig {
  actionCooldown: number;        // 초 단위 (기본 1.5)
  wallWeight: number;
  damageWeight: number;
  sellWeight: number;
  initialDamageNeeded: number;   // 첫 라운드 필요 피해 추정치
  damageNeededGrowth: number;    // 라운드 종료 시 가한 피해 × 이 값
  cannonChance: number;          // 다음 타워가 캐논일 확률
  maxWallCandidates: number;
  maxTowerCandidates: number;
  candidateIterations: number;
}

export const DEFAULT_DEFENDER_AI_CONFIG: DefenderAIConfig = {
  actionCooldown: 1.5,
  wallWeight: 1.0,
  damageWeight: 1.4,
  sellWeight: 1.0,
  initialDamageNeeded: 1000,
  damageNeededGrowth: 1.1,
  cannonChance: 1 / 7,
  maxWallCandidates: 5,
  maxTowerCandidates: 3,
  candidateIterations: 10,
};

export interface ActionScores {
  wall: number;
  defender: number;
  sell: number;
}

export enum DefenderAction {
  BUILD_WALL,
  BUILD_TOWER,
  SELL,  // 점수만 계산, 실행은 하지 않음
}

// 동점이면 앞쪽(벽 → 타워 → 판매)
const ACTION_ORDER: readonly DefenderAction[] = [
  DefenderAction.BUILD_WALL,
  DefenderAction.BUILD_TOWER,
  DefenderAction.SELL,
];

// ── 수비 AI ──────────────────────────────────────────────────────────────────

export class DefenderAI {
  readonly config: DefenderAIConfig;
  readonly planner: DefenderPlanner = new DefenderPlanner();
  private simulator: TowerDefenseSimulator;
  private random: () => number;

  private cooldown: RepeatingTimer;
  private needsRecompute: boolean = true;

  estimatedDamageNeeded: number;
  /** 이번 계산 이후 적이 끝 칸에 가장 가까이 온 거리 */
  closestApproach: number = 0;
  numWalls: number = 0;
  numDefenders: number = 0;
  // 한 번 false가 되면 다시 true로 돌아가지 않음
  canBuildWall: boolean = true;
  canBuildTower: boolean = true;
  nextTower: BuildingType | null = null;

  // 이벤트
  onAction?: (action: DefenderAction, success: boolean) => void;

  constructor(simulator: TowerDefenseSimulator, config: Partial<DefenderAIConfig> = {}, random: () => number = Math.random) {
    this.simulator = simulator;
    this.config = { ...DEFAULT_DEFENDER_AI_CONFIG, ...config };
    this.random = random;
    this.cooldown = new RepeatingTimer(this.config.actionCooldown);
    this.estimatedDamageNeeded = this.config.initialDamageNeeded;
  }

  // ── 퍼블릭 API ────────────────────────────────────────────────────────────

  notify(event: SimulationEvent): void {
    switch (event.type) {
      case 'fieldModified':
        this.needsRecompute = true;
        break;
      case 'roundStarted':
        this.closestApproach = this.planner.pathDistance;
        break;
      case 'roundOver':
        // 피해 0인 라운드(유닛 없이 종료)는 추정치를 0으로 만들지 않도록 건너뜀
        if (event.stats.damageDealt > 0) {
          this.estimatedDamageNeeded = event.stats.damageDealt * this.config.damageNeededGrowth;
        }
        break;
      default:
        break;
    }
  }

  update(delta: number): void {
    if (this.needsRecompute) {
      this.needsRecompute = false;
      this.recompute();
    }
    this.inspectAttackers();

    if (this.cooldown.tick(delta)) {
      this.decide();
    }
  }

  recompute(): void {
    const sim = this.simulator;
    this.planner.recompute(sim.field, sim.buildings, sim.getStructures());
    this.closestApproach = this.planner.pathDistance;
  }

  getWallFactor(): number {
    if (this.numWalls === 0) return 1;
    return 1 + this.numWalls / this.numDefenders;
  }

  getDistanceFactor(): number {
    const pathDistance = this.planner.pathDistance;
    return (pathDistance !== 0 ? this.closestApproach / pathDistance : 1) + 1;
  }

  computeScores(): ActionScores {
    const { wallWeight, damageWeight, sellWeight } = this.config;
    const ratio = this.planner.estimatedDamagePotential / this.estimatedDamageNeeded;
    const distanceFactor = this.getDistanceFactor();
    const wallFactor = Math.max(1, this.getWallFactor() * 0.2);

    const wall = ratio * (this.canBuildWall ? 1 : -1000) * (distanceFactor * 0.5) / wallFactor * wallWeight;
    const defender = Math.max(1, 1 - ratio) * (this.canBuildTower ? 1 : -1000) * distanceFactor * wallFactor * damageWeight;
    const sell = this.planner.getBestSellWeight() * sellWeight;
    return { wall, defender, sell };
  }

  /** 쿨다운 만료 시 한 번 실행. 선택된 행동을 돌려준다 */
  decide(): DefenderAction {
    const nextTower = this.nextTower ?? this.rollNextTower();

    const scores = this.computeScores();
    const values = [scores.wall, scores.defender, scores.sell];
    let bestIndex = 0;
    for (let i = 1; i < values.length; i++) {
      if (values[i] > values[bestIndex]) bestIndex = i;
    }
    const action = ACTION_ORDER[bestIndex];

    switch (action) {
      case DefenderAction.BUILD_WALL:
        this.buildWall();
        break;
      case DefenderAction.BUILD_TOWER:
        this.buildTower(nextTower);
        break;
      case DefenderAction.SELL:
        this.onAction?.(action, false);
        break;
    }
    return action;
  }

  // ── 행동 ─────────────────────────────────────────────────────────────────

  /** 벽 후보 중 하나를 무작위로 구매. 후보가 없으면 벽 건설을 영구 중단 */
  buildWall(): boolean {
    const { maxWallCandidates, candidateIterations } = this.config;
    const candidates = this.planner.getWallBuildActions(this.simulator.field, maxWallCandidates, candidateIterations);
    if (candidates.length === 0) {
      this.canBuildWall = false;
      console.log('[DefenderAI] 벽 후보 없음 → 벽 건설 중단');
      return false;
    }

    const pick = candidates[this.pickIndex(candidates.length)];
    const ok = this.simulator.buyStructure(BuildingType.Wall, pick.node);
    if (ok) this.numWalls++;
    this.onAction?.(DefenderAction.BUILD_WALL, ok);
    return ok;
  }

  buildTower(buildingType: BuildingType): boolean {
    const { maxTowerCandidates, candidateIterations } = this.config;
    const candidates = this.planner.getTowerBuildActions(
      this.simulator.field, buildingType, maxTowerCandidates, candidateIterations,
    );
    if (candidates.length === 0) {
      this.canBuildTower = false;
      console.log('[DefenderAI] 타워 후보 없음 → 타워 건설 중단');
      return false;
    }

    const pick = candidates[this.pickIndex(candidates.length)];
    const ok = this.simulator.buyStructure(pick.buildingType, pick.node);
    if (ok) {
      this.numDefenders++;
      this.nextTower = null;
    }
    this.onAction?.(DefenderAction.BUILD_TOWER, ok);
    return ok;
  }

  private rollNextTower(): BuildingType {
    this.nextTower = this.random() < this.config.cannonChance ? BuildingType.Cannon : BuildingType.Arrow;
    return this.nextTower;
  }

  private pickIndex(length: number): number {
    return Math.min(length - 1, Math.floor(this.random() * length));
  }

  private inspectAttackers(): void {
    const goal = this.simulator.field.endPosition;
    for (const attacker of this.simulator.getAttackers()) {
      const distance = vectorDistance(attacker.position, goal);
      if (distance < this.closestApproach) this.closestApproach = distance;
    }
  }
}
