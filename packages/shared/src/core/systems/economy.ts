import { SimulationState } from '../SimulationState';
import { vectorDistance } from '../Vector2';

/** 이번 틱의 처치/도착 이벤트를 골드·목숨·보너스에 반영 */
export function applyEconomy(state: SimulationState): void {
  const { defender, attacker } = state;

  for (const event of state.events.all()) {
    switch (event.type) {
      case 'kill':
        defender.gold += event.bounty;
        // 묶음 소환 유닛은 비용을 나눠서 환급
        attacker.gold += Math.floor(event.originalCost / event.groupSize);
        attacker.escrow.numKilled++;
        break;
      case 'reachedEnd':
        attacker.gold += event.bounty;
        defender.lives -= 1;
        attacker.escrow.numReachedEnd++;
        break;
      default:
        break;
    }
  }
}

export function collectRoundStats(state: SimulationState, delta: number): void {
  if (!state.round.isActive) return;
  const stats = state.roundStats;

  for (const event of state.events.all()) {
    if (event.type === 'kill') stats.killed++;
    else if (event.type === 'reachedEnd') stats.reachedEnd++;
    else if (event.type === 'damage') stats.damageDealt += event.amount;
  }
  stats.duration += delta;

  const goal = state.field.endPosition;
  for (const unit of state.attackers.values()) {
    const distance = vectorDistance(unit.position, goal);
    if (distance < stats.closestDistanceToEnd) stats.closestDistanceToEnd = distance;
  }
}
