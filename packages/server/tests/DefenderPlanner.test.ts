import { describe, expect, it } from 'vitest';
import { BuildingType, TowerDefenseSimulator, TowerField, createBuildingRegistry, gridNode } from '@tower-siege/shared';
import { DefenderPlanner } from '../src/ai/DefenderPlanner';

const createSimulator = (field = { width: 16, height: 16, start: gridNode(2, 0), end: gridNode(14, 15) }): TowerDefenseSimulator =>
  new TowerDefenseSimulator({ field }, { random: () => 0.5 });

describe('DefenderPlanner', () => {
  it('measures adjacency, damage potential and sell value around the path', () => {
    const sim = createSimulator({ width: 6, height: 3, start: gridNode(0, 1), end: gridNode(5, 1) });
    expect(sim.buyStructure(BuildingType.Arrow, gridNode(2, 2))).toBe(true);
    const planner = new DefenderPlanner();

    planner.recompute(sim.field, sim.buildings, sim.getStructures());

    expect(planner.pathLength).toBe(6);
    expect(planner.pathDistance).toBe(320);
    expect(planner.isOnPath(gridNode(3, 1))).toBe(true);
    expect(planner.getAdjacency(gridNode(3, 1))).toBe(0);
    expect(planner.getAdjacency(gridNode(2, 2))).toBe(3);
    expect(planner.getAdjacency(gridNode(0, 0))).toBe(2);
    // dps 25 × (160 / 40) × max(1, 3 × 0.4)
    expect(planner.estimatedDamagePotential).toBeCloseTo(120);
    expect(planner.getSellValues()).toHaveLength(1);
    expect(planner.getBestSellWeight()).toBeCloseTo(0.4);
  });

  it('has no sell value without offensive structures', () => {
    const sim = createSimulator();
    sim.buyStructure(BuildingType.Wall, gridNode(5, 5));
    const planner = new DefenderPlanner();

    planner.recompute(sim.field, sim.buildings, sim.getStructures());

    expect(planner.estimatedDamagePotential).toBe(0);
    expect(planner.getBestSellWeight()).toBe(0);
  });

  it('collects wall candidates next to the route in scan order', () => {
    const sim = createSimulator();
    const planner = new DefenderPlanner();
    planner.recompute(sim.field, sim.buildings, sim.getStructures());

    const candidates = planner.getWallBuildActions(sim.field, 5, 10);

    expect(candidates).toHaveLength(5);
    expect(candidates.slice(0, 3).map(c => c.node)).toEqual([
      { x: 1, y: 0 },
      { x: 3, y: 0 },
      { x: 2, y: 1 },
    ]);
    for (const candidate of candidates) {
      expect(candidate.weight).toBe(28);
    }
  });

  it('never offers the start cell or a cell that cuts the route', () => {
    const sim = createSimulator({ width: 3, height: 1, start: gridNode(0, 0), end: gridNode(2, 0) });
    const planner = new DefenderPlanner();
    planner.recompute(sim.field, sim.buildings, sim.getStructures());

    expect(planner.evaluateWallCandidate(sim.field, gridNode(0, 0))).toBeNull();
    expect(planner.evaluateWallCandidate(sim.field, gridNode(1, 0))).toBeNull();
    expect(planner.getWallBuildActions(sim.field, 5, 10)).toEqual([]);
  });

  it('weights a candidate by the length of the detour it forces', () => {
    const sim = createSimulator({ width: 3, height: 2, start: gridNode(0, 0), end: gridNode(2, 0) });
    const planner = new DefenderPlanner();
    planner.recompute(sim.field, sim.buildings, sim.getStructures());

    expect(planner.evaluateWallCandidate(sim.field, gridNode(1, 0))).toEqual({ node: { x: 1, y: 0 }, weight: 5 });
    expect(planner.evaluateWallCandidate(sim.field, gridNode(1, 1))).toEqual({ node: { x: 1, y: 1 }, weight: 3 });
  });

  it('tags tower candidates with the planned building type', () => {
    const sim = createSimulator();
    const planner = new DefenderPlanner();
    planner.recompute(sim.field, sim.buildings, sim.getStructures());

    const candidates = planner.getTowerBuildActions(sim.field, BuildingType.Cannon, 3, 10);

    expect(candidates).toEqual([
      { node: { x: 1, y: 0 }, buildingType: BuildingType.Cannon },
      { node: { x: 3, y: 0 }, buildingType: BuildingType.Cannon },
      { node: { x: 2, y: 1 }, buildingType: BuildingType.Cannon },
    ]);
  });

  describe('candidate reservoir', () => {
    // 5×3, 경로 (0,1) → (4,1). 경로 칸을 막으면 7노드 우회, 옆 칸은 5노드 그대로
    const plan = (): { field: TowerField; planner: DefenderPlanner } => {
      const field = new TowerField({ width: 5, height: 3, start: gridNode(0, 1), end: gridNode(4, 1) });
      const planner = new DefenderPlanner();
      planner.recompute(field, createBuildingRegistry(), []);
      return { field, planner };
    };

    it('fills the list in scan order until it is full', () => {
      const { field, planner } = plan();

      expect(planner.getWallBuildActions(field, 2, 5)).toEqual([
        { node: { x: 1, y: 1 }, weight: 7 },
        { node: { x: 0, y: 2 }, weight: 5 },
      ]);
    });

    it('keeps the earlier entry when a later candidate only ties the lightest', () => {
      const { field, planner } = plan();

      // 5번째 (0,0)은 가중치 5로 최소값과 같다
      expect(planner.getWallBuildActions(field, 2, 8)).toEqual([
        { node: { x: 1, y: 1 }, weight: 7 },
        { node: { x: 0, y: 2 }, weight: 5 },
      ]);
    });

    it('swaps a heavier candidate in for the lightest one', () => {
      const { field, planner } = plan();

      // 8번째 (2,1)은 경로를 끊어 가중치 7
      expect(planner.getWallBuildActions(field, 2, 9)).toEqual([
        { node: { x: 1, y: 1 }, weight: 7 },
        { node: { x: 2, y: 1 }, weight: 7 },
      ]);
    });

    it('stops scanning once the iteration budget is spent', () => {
      const { field, planner } = plan();

      // 예산이 충분하면 경로 끝까지 훑는다. 이후 후보는 7을 넘지 못함
      expect(planner.getWallBuildActions(field, 2, 100)).toEqual([
        { node: { x: 1, y: 1 }, weight: 7 },
        { node: { x: 2, y: 1 }, weight: 7 },
      ]);
      expect(planner.getWallBuildActions(field, 2, 1)).toEqual([
        { node: { x: 1, y: 1 }, weight: 7 },
        { node: { x: 0, y: 2 }, weight: 5 },
      ]);
    });
  });
});
