import { AttackerModel } from '../AttackerModel';
import { PROJECTILE_MAX_AGE, ProjectileModel } from '../ProjectileModel';
import { SimulationState } from '../SimulationState';
import { DefenderComponent, StructureModel } from '../StructureModel';
import {
  Vector2,
  boxesOverlap,
  clamp,
  lerpVector,
  normalizeOrZero,
  scaleVector,
  subtractVectors,
  vectorDistance,
} from '../Vector2';

// ── 타겟팅 ──

/** 사거리 안에서 체력이 가장 낮은 유닛. 동률이면 먼저 소환된 쪽 */
export function findLowestHealthTarget(
  state: SimulationState,
  origin: Vector2,
  range: number,
): AttackerModel | undefined {
  let best: AttackerModel | undefined;
  for (const attacker of state.attackers.values()) {
    if (vectorDistance(attacker.position, origin) > range) continue;
    if (!best || attacker.health < best.health) best = attacker;
  }
  return best;
}

function fireAt(state: SimulationState, structure: StructureModel, defender: DefenderComponent, target: AttackerModel): void {
  const attack = defender.attack;
  const origin = structure.position;
  const projectile = new ProjectileModel(state.allocateId(), attack.kind === 'projectile'
    ? {
      target: { kind: 'attacker', attackerId: target.id },
      sourceId: structure.id,
      motion: { kind: 'velocity', speed: attack.projectileSpeed },
      damage: attack.damage,
      damageType: attack.damageType,
      splashRadius: 0,
      size: attack.size,
      position: origin,
    }
    : {
      // 곡사는 발사 시점의 유닛 위치(지면)를 노린다
      target: { kind: 'ground', position: { ...target.position } },
      sourceId: structure.id,
      motion: { kind: 'fixedArc', duration: attack.travelTime, arcHeight: state.config.arcHeight, startPosition: origin },
      damage: attack.damage,
      damageType: attack.damageType,
      splashRadius: attack.splashRadius,
      size: attack.size,
      position: origin,
    });

  state.projectiles.set(projectile.id, projectile);
  state.events.emit({
    type: 'projectileFired',
    projectileId: projectile.id,
    sourceId: structure.id,
    target: projectile.target,
  });
}

export function updateDefenders(state: SimulationState, delta: number): void {
  for (const structure of state.structures.values()) {
    const defender = structure.defender;
    if (!defender) continue;

    if (defender.attackTimer.tick(delta)) {
      defender.pendingAttack = true;
    }
    if (!defender.pendingAttack) continue;

    const target = findLowestHealthTarget(state, structure.position, defender.attackRange);
    if (!target) continue;

    defender.pendingAttack = false;
    fireAt(state, structure, defender, target);
  }
}

// ── 투사체 이동 ──

function resolveTargetPosition(state: SimulationState, projectile: ProjectileModel): Vector2 | undefined {
  const target = projectile.target;
  if (target.kind === 'ground') return target.position;
  return state.attackers.get(target.attackerId)?.position;
}

export function moveProjectiles(state: SimulationState, delta: number): void {
  for (const projectile of [...state.projectiles.values()]) {
    projectile.age += delta;
    if (projectile.age >= PROJECTILE_MAX_AGE) {
      state.projectiles.delete(projectile.id);
      state.events.emit({ type: 'projectileExpired', projectileId: projectile.id });
      continue;
    }

    const targetPosition = resolveTargetPosition(state, projectile);
    if (!targetPosition) continue;

    const motion = projectile.motion;
    switch (motion.kind) {
      case 'velocity': {
        const direction = normalizeOrZero(subtractVectors(targetPosition, projectile.position));
        projectile.velocity = scaleVector(direction, motion.speed);
        projectile.position = {
          x: projectile.position.x + projectile.velocity.x * delta,
          y: projectile.position.y + projectile.velocity.y * delta,
        };
        break;
      }
      case 'fixed':
      case 'fixedArc': {
        // 높이(arcHeight)는 표시 전용. 지면 좌표는 직선 보간
        const factor = clamp(projectile.age / motion.duration, 0, 1);
        projectile.position = lerpVector(motion.startPosition, targetPosition, factor);
        break;
      }
    }
  }
}

// ── 충돌 ──

function retargetLostProjectiles(state: SimulationState, attackerId: number, deathPosition: Vector2): void {
  for (const projectile of state.projectiles.values()) {
    const target = projectile.target;
    if (target.kind === 'attacker' && target.attackerId === attackerId) {
      projectile.retargetToGround(deathPosition);
    }
  }
}

function damageAttacker(state: SimulationState, attacker: AttackerModel, projectile: ProjectileModel): void {
  const amount = projectile.damage;
  attacker.damage(amount);
  state.events.emit({
    type: 'damage',
    attackerId: attacker.id,
    amount,
    damageType: projectile.damageType,
    sourceId: projectile.sourceId,
  });
  if (attacker.isAlive) return;

  const deathPosition = { ...attacker.position };
  state.attackers.delete(attacker.id);
  const source = state.structures.get(projectile.sourceId);
  if (source?.defender) source.defender.killCount++;

  state.events.emit({
    type: 'kill',
    attackerId: attacker.id,
    attackerType: attacker.attackerType,
    bounty: attacker.bounty,
    originalCost: attacker.originalCost,
    groupSize: attacker.groupSize,
    position: deathPosition,
    sourceId: projectile.sourceId,
  });
  retargetLostProjectiles(state, attacker.id, deathPosition);
}

export function resolveCollisions(state: SimulationState): void {
  for (const projectile of [...state.projectiles.values()]) {
    if (projectile.dead) continue;
    const target = projectile.target;

    if (target.kind === 'attacker') {
      const attacker = state.attackers.get(target.attackerId);
      if (!attacker) continue;
      const hit = boxesOverlap(
        { position: attacker.position, size: attacker.size },
        { position: projectile.position, size: projectile.size },
      );
      if (!hit) continue;
      projectile.dead = true;
      damageAttacker(state, attacker, projectile);
    } else {
      const point = target.position;
      if (vectorDistance(projectile.position, point) >= state.config.groundHitDistance) continue;
      projectile.dead = true;
      if (projectile.splashRadius > 0) {
        const victims = [...state.attackers.values()]
          .filter(a => vectorDistance(a.position, point) <= projectile.splashRadius);
        for (const victim of victims) {
          damageAttacker(state, victim, projectile);
        }
      }
    }
  }

  for (const projectile of [...state.projectiles.values()]) {
    if (projectile.dead) state.projectiles.delete(projectile.id);
  }
}
