/** 반복 타이머. tick()이 이번 프레임에 만료됐는지 돌려준다 */
export class RepeatingTimer {
  readonly duration: number;
  private elapsed: number = 0;

  constructor(durationSeconds: number) {
    if (durationSeconds <= 0) {
      throw new Error(`Timer duration must be positive: ${durationSeconds}`);
    }
    this.duration = durationSeconds;
  }

  /** 한 프레임에 여러 번 만료돼도 true 한 번 */
  tick(delta: number): boolean {
    this.elapsed += delta;
    if (this.elapsed < this.duration) return false;
    this.elapsed %= this.duration;
    return true;
  }
}
