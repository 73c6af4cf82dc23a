import { AttackerModel } from './AttackerModel';
import { AttackerStats } from './AttackerStats';
import { BuildingRegistry } from './BuildingRegistry';
import { GridNode } from './GridNode';
import { ProjectileModel } from './ProjectileModel';
import { AttackerResources, BountyEscrow, DefenderResources, RoundStats, createRoundStats } from './ResourceStore';
import { RepeatingTimer } from './RepeatingTimer';
import { RoundModel } from './RoundModel';
import { EventLog } from './SimulationEvents';
import { StructureModel } from './StructureModel';
import { DEFAULT_FIELD_DATA, FieldData, SLOT_SIZE, TowerField } from './TowerField';
import { vectorDistance } from './Vector2';

export interface SimulationConfig {
  field: FieldData;
  defenderGold: number;       // 수비측 시작 골드 (기본 200)
  defenderLives: number;      // 수비측 시작 목숨 (기본 50)
  attackerGold: number;       // 공격측 시작 골드 (기본 200)
  spawnInterval: number;      // 초 단위 (기본 1.0)
  spawnOffset: number;        // 소환 위치 랜덤 오프셋 범위 ±
  waypointRadius: number;     // 이 거리 안이면 다음 웨이포인트로
  reachedEndDistance: number; // 도착 판정 거리
  groundHitDistance: number;  // 지면 타겟 착탄 판정 거리
  arcHeight: number;          // 곡사 높이 (표시용)
  recycleAttackersAtEnd: boolean; // false면 도착한 유닛 제거
}

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  field: DEFAULT_FIELD_DATA,
  defenderGold: 200,
  defenderLives: 50,
  attackerGold: 200,
  spawnInterval: 1.0,
  spawnOffset: 16,
  waypointRadius: SLOT_SIZE / 4,
  reachedEndDistance: 5,
  groundHitDistance: 4,
  arcHeight: 34,
  recycleAttackersAtEnd: true,
};

/** 시스템 함수들이 공유하는 시뮬레이션 상태 */
export class SimulationState {
  readonly config: SimulationConfig;
  readonly field: TowerField;
  readonly buildings: BuildingRegistry;
  readonly attackerStats: AttackerStats;
  readonly random: () => number;

  readonly attackers: Map<number, AttackerModel> = new Map();
  readonly structures: Map<number, StructureModel> = new Map();
  readonly projectiles: Map<number, ProjectileModel> = new Map();

  readonly defender: DefenderResources;
  readonly attacker: AttackerResources;
  readonly round: RoundModel = new RoundModel();
  roundStats: RoundStats;
  readonly events: EventLog = new EventLog();
  readonly spawnTimer: RepeatingTimer;

  /** 다음 틱 시작 시 fieldModified 발행 */
  fieldModified: boolean = false;
  private nextId: number = 1;

  constructor(
    config: SimulationConfig,
    buildings: BuildingRegistry,
    attackerStats: AttackerStats,
    random: () => number,
  ) {
    this.config = config;
    this.field = new TowerField(config.field);
    this.buildings = buildings;
    this.attackerStats = attackerStats;
    this.random = random;
    this.defender = { gold: config.defenderGold, lives: config.defenderLives };
    this.attacker = { gold: config.attackerGold, escrow: new BountyEscrow() };
    this.spawnTimer = new RepeatingTimer(config.spawnInterval);
    this.roundStats = createRoundStats(this.pathDistance);
  }

  allocateId(): number {
    return this.nextId++;
  }

  /** 시작-끝 월드 좌표 직선 거리 */
  get pathDistance(): number {
    return vectorDistance(this.field.startPosition, this.field.endPosition);
  }

  structureAt(node: GridNode): StructureModel | undefined {
    const id = this.field.getSlot(node)?.structureId;
    return id === undefined || id === null ? undefined : this.structures.get(id);
  }
}
