import { AttackerType } from '../../enums/AttackerType';
import { AttackerModel } from '../AttackerModel';
import { createRoundStats } from '../ResourceStore';
import { SimulationState } from '../SimulationState';

/** 묶음 크기만큼 시작 칸 주변(±spawnOffset)에 소환 */
export function spawnGroup(state: SimulationState, type: AttackerType): AttackerModel[] {
  const template = state.attackerStats.getStats(type);
  const origin = state.field.startPosition;
  const offset = state.config.spawnOffset;
  const spawned: AttackerModel[] = [];

  for (let i = 0; i < template.groupSize; i++) {
    const position = {
      x: origin.x + (state.random() * 2 - 1) * offset,
      y: origin.y + (state.random() * 2 - 1) * offset,
    };
    const attacker = new AttackerModel(state.allocateId(), template, position);
    state.attackers.set(attacker.id, attacker);
    spawned.push(attacker);
    state.events.emit({
      type: 'attackerSpawned',
      attackerId: attacker.id,
      attackerType: type,
      position: { ...attacker.position },
    });
  }
  return spawned;
}

// 타이머는 라운드와 무관하게 계속 돈다
export function processSpawnQueue(state: SimulationState, delta: number): void {
  const fired = state.spawnTimer.tick(delta);
  if (!fired || !state.round.isActive) return;

  const next = state.round.nextSpawn();
  if (next !== undefined) spawnGroup(state, next);
}

export function startRound(state: SimulationState): boolean {
  if (!state.round.tryStart()) return false;
  state.roundStats = createRoundStats(state.pathDistance);
  state.events.emit({ type: 'roundStarted', round: state.round.currentRound });
  return true;
}

/** 라운드 종료 시 보너스 지급 후 초기화 */
export function checkRoundEnd(state: SimulationState): void {
  if (!state.round.tryFinish(state.attackers.size)) return;

  const escrow = state.attacker.escrow;
  const paid = escrow.bounty;
  state.attacker.gold += paid;
  escrow.reset();
  state.events.emit({
    type: 'roundOver',
    round: state.round.currentRound,
    stats: { ...state.roundStats },
    escrowPaid: paid,
  });
}
