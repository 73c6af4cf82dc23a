import { AttackerType } from '../enums/AttackerType';

/** 라운드 진행 상태. 대기 큐는 다음 라운드 시작 시 통째로 활성 큐로 넘어간다 */
export class RoundModel {
  private pendingQueue: AttackerType[] = [];
  private activeQueue: AttackerType[] = [];
  private active: boolean = false;
  private roundNumber: number = 0;

  get isActive(): boolean {
    return this.active;
  }

  get currentRound(): number {
    return this.roundNumber;
  }

  get pending(): readonly AttackerType[] {
    return this.pendingQueue;
  }

  queue(type: AttackerType): void {
    this.pendingQueue.push(type);
  }

  /** 진행 중이 아니고 활성 큐가 비어 있을 때만 시작 */
  tryStart(): boolean {
    if (this.active || this.activeQueue.length > 0) return false;
    this.active = true;
    this.activeQueue = this.pendingQueue;
    this.pendingQueue = [];
    this.roundNumber++;
    return true;
  }

  nextSpawn(): AttackerType | undefined {
    return this.activeQueue.shift();
  }

  /** 활성 + 큐 비었음 + 유닛 없음 → 종료 */
  tryFinish(aliveAttackers: number): boolean {
    if (!this.active || this.activeQueue.length > 0 || aliveAttackers > 0) return false;
    this.active = false;
    return true;
  }
}
