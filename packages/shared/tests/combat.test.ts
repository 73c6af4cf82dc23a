import { describe, expect, it } from 'vitest';
import { SimulationState, DEFAULT_SIMULATION_CONFIG } from '../src/core/SimulationState';
import { createBuildingRegistry } from '../src/core/BuildingRegistry';
import { createAttackerStats } from '../src/core/AttackerStats';
import { ProjectileModel, PROJECTILE_MAX_AGE } from '../src/core/ProjectileModel';
import type { ProjectileInit } from '../src/core/ProjectileModel';
import { findLowestHealthTarget, moveProjectiles, resolveCollisions } from '../src/core/systems/combat';
import { spawnGroup } from '../src/core/systems/rounds';
import { AttackerType } from '../src/enums/AttackerType';
import { DamageType } from '../src/enums/DamageType';
import type { AttackerModel } from '../src/core/AttackerModel';

// 오프셋 0으로 소환되도록 0.5 고정
const createState = (): SimulationState =>
  new SimulationState(DEFAULT_SIMULATION_CONFIG, createBuildingRegistry(), createAttackerStats(), () => 0.5);

const arrowAt = (state: SimulationState, target: AttackerModel, position: { x: number; y: number }, damage: number): ProjectileModel => {
  const init: ProjectileInit = {
    target: { kind: 'attacker', attackerId: target.id },
    sourceId: 999,
    motion: { kind: 'velocity', speed: 320 },
    damage,
    damageType: DamageType.Piercing,
    splashRadius: 0,
    size: { x: 12, y: 12 },
    position,
  };
  const projectile = new ProjectileModel(state.allocateId(), init);
  state.projectiles.set(projectile.id, projectile);
  return projectile;
};

const singleSpider = (state: SimulationState): AttackerModel => {
  const [spider, ...rest] = spawnGroup(state, AttackerType.Spider);
  for (const other of rest) state.attackers.delete(other.id);
  state.events.clear();
  return spider;
};

describe('projectile collisions', () => {
  it('kills a 56-health unit with a 60-damage projectile in the same tick', () => {
    const state = createState();
    const spider = singleSpider(state);
    arrowAt(state, spider, { x: 130, y: 2 }, 60);

    resolveCollisions(state);

    expect(spider.health).toBeLessThanOrEqual(0);
    expect(state.attackers.has(spider.id)).toBe(false);
    expect(state.projectiles.size).toBe(0);
    expect(state.events.ofType('damage')).toEqual([
      { type: 'damage', attackerId: spider.id, amount: 60, damageType: DamageType.Piercing, sourceId: 999 },
    ]);
    expect(state.events.ofType('kill')).toEqual([{
      type: 'kill',
      attackerId: spider.id,
      attackerType: AttackerType.Spider,
      bounty: 15,
      originalCost: 60,
      groupSize: 3,
      position: { x: 128, y: 0 },
      sourceId: 999,
    }]);
  });

  it('does not count touching edges as a hit', () => {
    const state = createState();
    const spider = singleSpider(state);
    // 거미 박스 [128, 142] x [0, 14]
    const projectile = arrowAt(state, spider, { x: 142, y: 0 }, 60);

    resolveCollisions(state);

    expect(state.attackers.has(spider.id)).toBe(true);
    expect(state.projectiles.has(projectile.id)).toBe(true);
    expect(state.events.all()).toEqual([]);
  });

  it('retargets projectiles whose unit died to the death position', () => {
    const state = createState();
    const spider = singleSpider(state);
    arrowAt(state, spider, { x: 128, y: 0 }, 60);
    const late = arrowAt(state, spider, { x: 400, y: 400 }, 20);

    resolveCollisions(state);

    expect(late.target).toEqual({ kind: 'ground', position: { x: 128, y: 0 } });
    expect(state.projectiles.has(late.id)).toBe(true);
  });

  it('resolves a ground projectile with no splash without damage', () => {
    const state = createState();
    const spider = singleSpider(state);
    const projectile = arrowAt(state, spider, { x: 129, y: 1 }, 20);
    projectile.retargetToGround({ x: 128, y: 0 });

    resolveCollisions(state);

    expect(state.projectiles.size).toBe(0);
    expect(spider.health).toBe(56);
  });

  it('damages every unit within the splash radius', () => {
    const state = createState();
    const spiders = spawnGroup(state, AttackerType.Spider);
    state.events.clear();
    const far = spiders[2];
    far.position = { x: 128, y: 100 };

    const shell = new ProjectileModel(state.allocateId(), {
      target: { kind: 'ground', position: { x: 128, y: 0 } },
      sourceId: 999,
      motion: { kind: 'fixedArc', duration: 1.2, arcHeight: 34, startPosition: { x: 192, y: 0 } },
      damage: 30,
      damageType: DamageType.Explosive,
      splashRadius: 48,
      size: { x: 16, y: 16 },
      position: { x: 130, y: 0 },
    });
    state.projectiles.set(shell.id, shell);

    resolveCollisions(state);

    expect(spiders[0].health).toBe(26);
    expect(spiders[1].health).toBe(26);
    expect(far.health).toBe(56);
    expect(state.events.ofType('damage')).toHaveLength(2);
    expect(state.projectiles.size).toBe(0);
  });
});

describe('projectile motion', () => {
  it('steers velocity projectiles toward the live target', () => {
    const state = createState();
    const spider = singleSpider(state);
    const projectile = arrowAt(state, spider, { x: 128, y: 320 }, 20);

    moveProjectiles(state, 0.5);

    expect(projectile.velocity).toEqual({ x: 0, y: -320 });
    expect(projectile.position).toEqual({ x: 128, y: 160 });
  });

  it('interpolates fixed-duration motion and clamps at the target', () => {
    const state = createState();
    const shell = new ProjectileModel(state.allocateId(), {
      target: { kind: 'ground', position: { x: 100, y: 0 } },
      sourceId: 1,
      motion: { kind: 'fixed', duration: 2, startPosition: { x: 0, y: 0 } },
      damage: 1,
      damageType: DamageType.Crushing,
      splashRadius: 0,
      size: { x: 4, y: 4 },
      position: { x: 0, y: 0 },
    });
    state.projectiles.set(shell.id, shell);

    moveProjectiles(state, 0.5);
    expect(shell.position).toEqual({ x: 25, y: 0 });

    moveProjectiles(state, 5);
    expect(shell.position).toEqual({ x: 100, y: 0 });
  });

  it('removes projectiles once they reach the maximum age', () => {
    const state = createState();
    const spider = singleSpider(state);
    const projectile = arrowAt(state, spider, { x: 500, y: 500 }, 20);
    projectile.age = PROJECTILE_MAX_AGE - 0.05;

    moveProjectiles(state, 0.1);

    expect(state.projectiles.size).toBe(0);
    expect(state.events.all()).toEqual([{ type: 'projectileExpired', projectileId: projectile.id }]);
    expect(spider.health).toBe(56);
  });
});

describe('targeting', () => {
  it('picks the lowest-health unit within range', () => {
    const state = createState();
    const [a, b, c] = spawnGroup(state, AttackerType.Spider);
    b.health = 10;
    c.health = 5;
    c.position = { x: 1000, y: 1000 };

    expect(findLowestHealthTarget(state, { x: 192, y: 0 }, 160)?.id).toBe(b.id);
    expect(findLowestHealthTarget(state, { x: 192, y: 0 }, 10)).toBeUndefined();
    expect(a.health).toBe(56);
  });
});
