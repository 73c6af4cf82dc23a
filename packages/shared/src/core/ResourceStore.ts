export interface DefenderResources {
  gold: number;
  lives: number;
}

/** 라운드 종료 시 지급되는 보너스. 처치/도착 수로 계산 */
export class BountyEscrow {
  static readonly PER_KILL = 2;
  static readonly PER_REACHED_END = 10;

  numKilled: number = 0;
  numReachedEnd: number = 0;

  get bounty(): number {
    return this.numKilled * BountyEscrow.PER_KILL + this.numReachedEnd * BountyEscrow.PER_REACHED_END;
  }

  reset(): void {
    this.numKilled = 0;
    this.numReachedEnd = 0;
  }
}

export interface AttackerResources {
  gold: number;
  escrow: BountyEscrow;
}

export interface RoundStats {
  damageDealt: number;
  /** 초 */
  duration: number;
  reachedEnd: number;
  killed: number;
  closestDistanceToEnd: number;
}

export function createRoundStats(pathDistance: number): RoundStats {
  return {
    damageDealt: 0,
    duration: 0,
    reachedEnd: 0,
    killed: 0,
    closestDistanceToEnd: pathDistance,
  };
}
