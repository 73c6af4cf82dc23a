import { SimulationState } from '../SimulationState';
import { normalizeOrZero, scaleVector, subtractVectors, vectorDistance, vectorLength } from '../Vector2';

export function steerAttackers(state: SimulationState, delta: number): void {
  const { waypointRadius } = state.config;

  for (const attacker of state.attackers.values()) {
    const path = attacker.path;
    if (path === null || path.isEmpty) continue;

    let target = path.targetPosition();
    if (vectorDistance(attacker.position, target) < waypointRadius) {
      path.advanceCursor();
      target = path.targetPosition();
    }
    const toTarget = subtractVectors(target, attacker.position);
    // 이번 틱 이동량이 남은 거리 이상이면 웨이포인트에 정확히 멈춘다
    attacker.velocity = delta > 0 && attacker.movementSpeed * delta >= vectorLength(toTarget)
      ? scaleVector(toTarget, 1 / delta)
      : scaleVector(normalizeOrZero(toTarget), attacker.movementSpeed);
  }

  for (const attacker of state.attackers.values()) {
    attacker.position = {
      x: attacker.position.x + attacker.velocity.x * delta,
      y: attacker.position.y + attacker.velocity.y * delta,
    };
  }
}

/** 끝 칸에 닿은 유닛: 이벤트 발행 후 시작점으로 되돌리거나 제거 */
export function checkReachedEnd(state: SimulationState): void {
  const { field, config } = state;
  const goal = field.endPosition;

  for (const attacker of [...state.attackers.values()]) {
    if (vectorDistance(goal, attacker.position) > config.reachedEndDistance) continue;

    state.events.emit({ type: 'reachedEnd', attackerId: attacker.id, bounty: attacker.bounty });
    if (config.recycleAttackersAtEnd) {
      attacker.position = field.startPosition;
      attacker.clearPath();
    } else {
      state.attackers.delete(attacker.id);
    }
  }
}
