import {
  BuildingRegistry,
  BuildingType,
  PathModel,
  SLOT_SIZE,
  StructureModel,
  TowerField,
  findPath,
  getAllNeighbors,
  getSelfWithSuccessors,
  gridNode,
  nodeKey,
  vectorDistance,
} from '@tower-siege/shared';
import type { GridNode } from '@tower-siege/shared';

// ── 타입 정의 ────────────────────────────────────────────────────────────────

export interface WeightedNode {
  node: GridNode;
  weight: number;
}

export interface TowerCandidate {
  node: GridNode;
  buildingType: BuildingType;
}

/** 피해 잠재력 추정에 쓰는 평균 적 이동 속도 */
const ASSUMED_ENEMY_SPEED = 40;
const ADJACENCY_BONUS = 0.4;
const SELL_PENALTY_PER_PATH_CELL = 0.1;

// ── 배치 계획 캐시 ────────────────────────────────────────────────────────────

/**
 * 필드가 바뀔 때마다 다시 계산하는 수비 AI 계획 데이터.
 * 현재 최단 경로, 경로 인접도, 피해 잠재력, 판매 가치.
 */
export class DefenderPlanner {
  path: PathModel = PathModel.empty();
  pathLength: number = 0;
  /** 시작-끝 월드 직선 거리 */
  pathDistance: number = 0;
  estimatedDamagePotential: number = 0;

  private pathCells: Set<string> = new Set();
  private adjacency: Map<string, number> = new Map();
  private sellValues: WeightedNode[] = [];

  recompute(field: TowerField, buildings: BuildingRegistry, structures: readonly StructureModel[]): void {
    // 경로를 못 찾으면 이전 경로 유지
    const path = findPath(field, field.start, field.end);
    if (path) {
      this.path = path;
      this.pathLength = path.size();
      this.pathCells = new Set(path.nodes().map(nodeKey));
    }
    this.pathDistance = vectorDistance(field.startPosition, field.endPosition);

    this.adjacency.clear();
    for (let x = 0; x < field.width; x++) {
      for (let y = 0; y < field.height; y++) {
        const node = gridNode(x, y);
        if (this.isOnPath(node)) continue;
        const count = getAllNeighbors(node).filter(n => this.isOnPath(n)).length;
        this.adjacency.set(nodeKey(node), count);
      }
    }

    this.estimatedDamagePotential = 0;
    this.sellValues = [];
    for (const structure of structures) {
      const defender = structure.defender;
      if (!defender) continue;

      const adjacent = Math.max(1, this.getAdjacency(structure.node) * ADJACENCY_BONUS);
      const timeToTravel = defender.attackRange / ASSUMED_ENEMY_SPEED;
      this.estimatedDamagePotential += buildings.getDps(structure.buildingType) * timeToTravel * adjacent;

      this.sellValues.push({ node: structure.node, weight: this.computeSellValue(structure.node, defender.attackRange) });
    }
    this.sellValues.sort((a, b) => a.weight - b.weight);
  }

  isOnPath(node: GridNode): boolean {
    return this.pathCells.has(nodeKey(node));
  }

  /** 경로 위 칸은 0 */
  getAdjacency(node: GridNode): number {
    return this.adjacency.get(nodeKey(node)) ?? 0;
  }

  getSellValues(): readonly WeightedNode[] {
    return this.sellValues;
  }

  /** 오름차순 정렬이므로 마지막이 최고값. 공격 구조물이 없으면 0 */
  getBestSellWeight(): number {
    return this.sellValues[this.sellValues.length - 1]?.weight ?? 0;
  }

  isAdjacentToOrOnPath(node: GridNode): boolean {
    return this.isOnPath(node) || getAllNeighbors(node).some(n => this.isOnPath(n));
  }

  /** 사거리 사각형 안의 경로 칸 하나당 0.1 감소 */
  private computeSellValue(node: GridNode, attackRange: number): number {
    const reach = attackRange / SLOT_SIZE;
    const minX = Math.floor(node.x - reach);
    const maxX = Math.ceil(node.x + reach);
    const minY = Math.floor(node.y - reach);
    const maxY = Math.ceil(node.y + reach);

    let value = 1;
    for (let x = minX; x <= maxX; x++) {
      for (let y = minY; y <= maxY; y++) {
        if (this.isOnPath(gridNode(x, y))) value -= SELL_PENALTY_PER_PATH_CELL;
      }
    }
    return value;
  }

  // ── 후보 생성 ────────────────────────────────────────────────────────────────

  /** 경로 근처 + 비어 있음 + 막아도 경로가 남음. 가중치 = 막았을 때의 경로 노드 수 */
  evaluateWallCandidate(field: TowerField, node: GridNode): WeightedNode | null {
    if (!this.isAdjacentToOrOnPath(node) || field.isOccupied(node)) return null;
    const weight = findPath(field, field.start, field.end, node)?.size() ?? 0;
    return weight > 0 ? { node, weight } : null;
  }

  /**
   * 경로 노드와 그 4방향 이웃을 순서대로 훑는다. maxLength개까지는 그대로 담고,
   * 이후 iterationBudget 안에서는 최소 가중치 후보보다 무거우면 교체한다.
   */
  getWallBuildActions(field: TowerField, maxLength: number, iterationBudget: number): WeightedNode[] {
    const results: WeightedNode[] = [];
    const seen = new Set<string>();
    let iterations = 0;

    for (const pathNode of this.path.nodes()) {
      for (const candidate of getSelfWithSuccessors(pathNode)) {
        iterations++;
        const key = nodeKey(candidate);
        if (seen.has(key)) continue;
        seen.add(key);

        if (results.length < maxLength) {
          const weighted = this.evaluateWallCandidate(field, candidate);
          if (weighted) results.push(weighted);
        } else if (iterations < iterationBudget && results.length > 0) {
          const weighted = this.evaluateWallCandidate(field, candidate);
          if (!weighted) continue;
          let minIndex = 0;
          for (let i = 1; i < results.length; i++) {
            if (results[i].weight < results[minIndex].weight) minIndex = i;
          }
          if (weighted.weight > results[minIndex].weight) {
            results[minIndex] = weighted;
          }
        } else {
          return results;
        }
      }
    }
    return results;
  }

  /** 타워 후보는 벽 후보 규칙을 그대로 쓰고 예정된 타워 종류를 붙인다 */
  getTowerBuildActions(
    field: TowerField,
    buildingType: BuildingType,
    maxLength: number,
    iterationBudget: number,
  ): TowerCandidate[] {
    return this.getWallBuildActions(field, maxLength, iterationBudget)
      .map(({ node }) => ({ node, buildingType }));
  }
}
