import { AttackerType } from '../enums/AttackerType';
import { BuildingType } from '../enums/BuildingType';
import { UpgradeType } from '../enums/UpgradeType';
import type { GameState } from '../types/GameState';
import { AttackerModel } from './AttackerModel';
import { AttackerStats, createAttackerStats } from './AttackerStats';
import { BuildingRegistry, createBuildingRegistry } from './BuildingRegistry';
import { GridNode } from './GridNode';
import { hasPath } from './PathFinder';
import { ProjectileModel } from './ProjectileModel';
import { RoundStats } from './ResourceStore';
import { SimulationEvent } from './SimulationEvents';
import { DEFAULT_SIMULATION_CONFIG, SimulationConfig, SimulationState } from './SimulationState';
import { StructureModel } from './StructureModel';
import { TowerField } from './TowerField';
import { applyEconomy, collectRoundStats } from './systems/economy';
import { checkReachedEnd, steerAttackers } from './systems/movement';
import { assignInitialPaths, repathAttackers } from './systems/pathing';
import { checkRoundEnd, processSpawnQueue, spawnGroup, startRound } from './systems/rounds';
import { moveProjectiles, resolveCollisions, updateDefenders } from './systems/combat';

export interface SimulatorDependencies {
  buildings?: BuildingRegistry;
  attackerStats?: AttackerStats;
  /** [0, 1) 난수. 테스트에서 고정값 주입 */
  random?: () => number;
}

export class TowerDefenseSimulator {
  readonly config: SimulationConfig;
  private readonly state: SimulationState;
  private tickCount: number = 0;

  // 이벤트
  onEvent?: (event: SimulationEvent) => void;

  constructor(config: Partial<SimulationConfig> = {}, deps: SimulatorDependencies = {}) {
    this.config = { ...DEFAULT_SIMULATION_CONFIG, ...config };
    this.state = new SimulationState(
      this.config,
      deps.buildings ?? createBuildingRegistry(),
      deps.attackerStats ?? createAttackerStats(),
      deps.random ?? Math.random,
    );
    this.state.events.listener = (event) => this.onEvent?.(event);
  }

  /** delta(초) 만큼 시뮬레이션 진행 */
  update(delta: number): void {
    const state = this.state;
    state.events.clear();
    this.tickCount++;

    // 구조물 변경은 다음 틱 시작에 한 번만 알림
    const fieldChanged = state.fieldModified;
    if (fieldChanged) {
      state.fieldModified = false;
      state.events.emit({ type: 'fieldModified' });
    }

    processSpawnQueue(state, delta);
    assignInitialPaths(state);
    if (fieldChanged) repathAttackers(state);
    steerAttackers(state, delta);
    checkReachedEnd(state);

    updateDefenders(state, delta);
    moveProjectiles(state, delta);
    resolveCollisions(state);

    applyEconomy(state);
    collectRoundStats(state, delta);
    checkRoundEnd(state);
  }

  // ── 명령 ──

  /**
   * 골드·범위·점유 검사 후 배치. 막는 구조물은 시작/끝 칸이나 경로를 완전히 끊는 칸에 둘 수 없다.
   * 실패 시 아무 것도 바꾸지 않고 false.
   */
  buyStructure(type: BuildingType, node: GridNode): boolean {
    const { field, buildings, defender } = this.state;
    const definition = buildings.get(type);

    if (defender.gold < definition.cost) return false;
    if (node.x < 0 || node.y < 0 || !field.isInside(node)) return false;
    if (field.isOccupied(node)) return false;
    if (definition.blocking) {
      if (field.isStartOrEnd(node)) return false;
      if (!hasPath(field, field.start, field.end, node)) return false;
    }

    defender.gold -= definition.cost;
    const structure = new StructureModel(this.state.allocateId(), definition, node);
    this.state.structures.set(structure.id, structure);
    field.addStructure(structure.node, structure.id, structure.blocking);
    this.state.fieldModified = true;
    this.state.events.emit({
      type: 'structurePlaced',
      structureId: structure.id,
      buildingType: structure.buildingType,
      node: structure.node,
    });
    return true;
  }

  /** 구조물 제거, 비용 절반 환급 */
  requestRemoval(node: GridNode): boolean {
    const structure = this.state.structureAt(node);
    if (!structure) return false;

    const refund = Math.floor(this.state.buildings.getCost(structure.buildingType) / 2);
    this.state.structures.delete(structure.id);
    this.state.field.clearSlot(structure.node);
    this.state.defender.gold += refund;
    this.state.fieldModified = true;
    this.state.events.emit({
      type: 'structureRemoved',
      structureId: structure.id,
      buildingType: structure.buildingType,
      node: structure.node,
      refund,
    });
    return true;
  }

  /** 공격측 유닛 구매 → 다음 라운드 대기 큐 */
  queueAttacker(type: AttackerType): boolean {
    const cost = this.state.attackerStats.getCost(type);
    if (this.state.attacker.gold < cost) return false;
    this.state.attacker.gold -= cost;
    this.state.round.queue(type);
    return true;
  }

  upgradeAttacker(type: AttackerType, upgrade: UpgradeType): boolean {
    const stats = this.state.attackerStats;
    const cost = stats.getUpgradeCost(type, upgrade);
    if (this.state.attacker.gold < cost) return false;
    this.state.attacker.gold -= cost;
    stats.applyUpgrade(type, upgrade);
    return true;
  }

  requestRoundStart(): boolean {
    return startRound(this.state);
  }

  /** 큐를 거치지 않고 즉시 소환 (디버그/테스트용) */
  spawnAttackers(type: AttackerType): AttackerModel[] {
    return spawnGroup(this.state, type);
  }

  // ── 조회 ──

  get field(): TowerField {
    return this.state.field;
  }

  get buildings(): BuildingRegistry {
    return this.state.buildings;
  }

  get attackerStats(): AttackerStats {
    return this.state.attackerStats;
  }

  get defenderGold(): number {
    return this.state.defender.gold;
  }

  get lives(): number {
    return this.state.defender.lives;
  }

  get attackerGold(): number {
    return this.state.attacker.gold;
  }

  get escrowBounty(): number {
    return this.state.attacker.escrow.bounty;
  }

  get roundStats(): Readonly<RoundStats> {
    return this.state.roundStats;
  }

  get isRoundActive(): boolean {
    return this.state.round.isActive;
  }

  get currentRound(): number {
    return this.state.round.currentRound;
  }

  get hasPendingFieldChange(): boolean {
    return this.state.fieldModified;
  }

  /** 마지막 update() 이후 발생한 이벤트 */
  get tickEvents(): readonly SimulationEvent[] {
    return this.state.events.all();
  }

  getAttackers(): AttackerModel[] {
    return [...this.state.attackers.values()];
  }

  getAttacker(id: number): AttackerModel | undefined {
    return this.state.attackers.get(id);
  }

  getStructures(): StructureModel[] {
    return [...this.state.structures.values()];
  }

  getStructureAt(node: GridNode): StructureModel | undefined {
    return this.state.structureAt(node);
  }

  getProjectiles(): ProjectileModel[] {
    return [...this.state.projectiles.values()];
  }

  getKillCount(structureId: number): number {
    return this.state.structures.get(structureId)?.defender?.killCount ?? 0;
  }

  getState(): GameState {
    const state = this.state;
    return {
      tick: this.tickCount,
      round: state.round.currentRound,
      roundActive: state.round.isActive,
      pendingSpawns: [...state.round.pending],
      defenderGold: state.defender.gold,
      lives: state.defender.lives,
      attackerGold: state.attacker.gold,
      escrowBounty: state.attacker.escrow.bounty,
      roundStats: { ...state.roundStats },
      attackers: this.getAttackers().map(a => ({
        id: a.id,
        attackerType: a.attackerType,
        x: a.position.x,
        y: a.position.y,
        health: a.health,
        maxHealth: a.maxHealth,
        waypoint: a.path && !a.path.isEmpty ? { ...a.path.targetNode() } : null,
      })),
      structures: this.getStructures().map(s => ({
        id: s.id,
        buildingType: s.buildingType,
        x: s.node.x,
        y: s.node.y,
        killCount: s.defender?.killCount ?? 0,
      })),
      projectiles: this.getProjectiles().map(p => ({
        id: p.id,
        sourceId: p.sourceId,
        x: p.position.x,
        y: p.position.y,
        target: p.target,
      })),
    };
  }
}
