import { findPath } from '../PathFinder';
import { SimulationState } from '../SimulationState';

/** 경로 없는 유닛은 매 틱 시작→끝 경로를 시도 */
export function assignInitialPaths(state: SimulationState): void {
  const { field } = state;
  for (const attacker of state.attackers.values()) {
    if (attacker.path !== null) continue;
    const path = findPath(field, field.start, field.end);
    if (path) attacker.path = path;
  }
}

/**
 * 필드 변경 후 재탐색. 커서에서 뒤로 막히지 않은 노드까지 물러나 거기서 끝까지 찾는다.
 * 못 찾으면 기존 경로 유지.
 */
export function repathAttackers(state: SimulationState): void {
  const { field } = state;
  for (const attacker of state.attackers.values()) {
    const current = attacker.path;
    if (current === null || current.isEmpty) continue;

    let index = current.cursorIndex();
    while (index > 0 && field.isBlocked(current.nodeAt(index))) {
      index--;
    }
    const path = findPath(field, current.nodeAt(index), field.end);
    if (path) attacker.path = path;
  }
}
