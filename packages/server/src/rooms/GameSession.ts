import {
  AttackerType,
  BuildingType,
  SLOT_SIZE,
  TowerDefenseSimulator,
  UpgradeType,
  clamp,
  gridNode,
} from '@tower-siege/shared';
import type {
  GameState,
  SessionStartedMsg,
  SimulationConfig,
  SimulationEvent,
  SimulatorDependencies,
} from '@tower-siege/shared';
import { DefenderAI } from '../ai/DefenderAI';
import type { DefenderAIConfig } from '../ai/DefenderAI';

export const MIN_GAME_SPEED = 0.4;
export const MAX_GAME_SPEED = 4.0;

export interface GameSessionOptions {
  simulation?: Partial<SimulationConfig>;
  ai?: Partial<DefenderAIConfig>;
  dependencies?: SimulatorDependencies;
}

/** 시뮬레이터 + 수비 AI + 배속. 소켓과 무관하게 진행 가능 */
export class GameSession {
  readonly id: string;
  readonly simulator: TowerDefenseSimulator;
  readonly ai: DefenderAI;
  private gameSpeed: number = 1;

  onEvent?: (event: SimulationEvent) => void;

  constructor(id: string, options: GameSessionOptions = {}) {
    this.id = id;
    this.simulator = new TowerDefenseSimulator(options.simulation, options.dependencies);
    this.ai = new DefenderAI(this.simulator, options.ai, options.dependencies?.random);

    // AI가 먼저 관찰하고 나서 클라이언트로 전달
    this.simulator.onEvent = (event) => {
      this.ai.notify(event);
      this.onEvent?.(event);
    };
  }

  get speed(): number {
    return this.gameSpeed;
  }

  /** 실제 경과 시간(초)에 배속을 곱해 한 틱 진행 */
  step(realDelta: number): void {
    const delta = realDelta * this.gameSpeed;
    this.simulator.update(delta);
    this.ai.update(delta);
  }

  setSpeed(speed: number): number {
    this.gameSpeed = clamp(speed, MIN_GAME_SPEED, MAX_GAME_SPEED);
    return this.gameSpeed;
  }

  queueAttacker(type: AttackerType): boolean {
    return this.simulator.queueAttacker(type);
  }

  upgradeAttacker(type: AttackerType, upgrade: UpgradeType): boolean {
    return this.simulator.upgradeAttacker(type, upgrade);
  }

  startRound(): boolean {
    return this.simulator.requestRoundStart();
  }

  placeStructure(type: BuildingType, x: number, y: number): boolean {
    return this.simulator.buyStructure(type, gridNode(x, y));
  }

  removeStructure(x: number, y: number): boolean {
    return this.simulator.requestRemoval(gridNode(x, y));
  }

  getState(): GameState {
    return this.simulator.getState();
  }

  createStartedMessage(): SessionStartedMsg {
    return {
      sessionId: this.id,
      field: this.simulator.config.field,
      slotSize: SLOT_SIZE,
      buildings: this.simulator.buildings.all(),
      state: this.getState(),
    };
  }
}
