import { Socket } from 'socket.io';
import { SocketEvent } from '@tower-siege/shared';
import type { ActionRejectedMsg, SimulationEventMsg, SpeedChangedMsg, StateSnapshotMsg } from '@tower-siege/shared';
import { DefenderAction } from '../ai/DefenderAI';
import { GameSession } from './GameSession';
import type { GameSessionOptions } from './GameSession';
import {
  parsePlaceStructure,
  parseQueueAttacker,
  parseRemoveStructure,
  parseSetSpeed,
  parseUpgradeAttacker,
} from './validators';

const DEFAULT_TICK_INTERVAL_MS = 50;  // 20 FPS 서버 틱
const SNAPSHOT_INTERVAL_MS = 1000;

const INPUT_EVENTS = [
  SocketEvent.QUEUE_ATTACKER,
  SocketEvent.START_ROUND,
  SocketEvent.UPGRADE_ATTACKER,
  SocketEvent.PLACE_STRUCTURE,
  SocketEvent.REMOVE_STRUCTURE,
  SocketEvent.SET_SPEED,
] as const;

/** 소켓 하나(공격측 플레이어) 대 수비 AI 세션 */
export class GameRoom {
  readonly id: string;
  readonly session: GameSession;
  private socket: Socket;
  private tickIntervalMs: number;
  private tickTimer: NodeJS.Timeout | null = null;
  private lastTickTime: number = Date.now();
  private sinceSnapshotMs: number = 0;
  onDestroy?: () => void;

  constructor(id: string, socket: Socket, tickIntervalMs: number = DEFAULT_TICK_INTERVAL_MS, options: GameSessionOptions = {}) {
    this.id = id;
    this.socket = socket;
    this.tickIntervalMs = tickIntervalMs;
    this.session = new GameSession(id, options);

    // 시뮬레이션 이벤트는 type을 이벤트 이름으로 그대로 전달
    this.session.onEvent = (event) => {
      const msg: SimulationEventMsg = event;
      this.socket.emit(msg.type, msg);
    };

    this.session.ai.onAction = (action, success) => {
      if (success) console.log(`[GameRoom ${this.id}] AI 행동: ${DefenderAction[action]}`);
    };
  }

  start(): void {
    this.socket.emit(SocketEvent.SESSION_STARTED, this.session.createStartedMessage());

    // 입력 이벤트 등록
    this.socket.on(SocketEvent.QUEUE_ATTACKER, (data: unknown) => {
      const msg = parseQueueAttacker(data);
      if (!msg) return this.warnInvalid(SocketEvent.QUEUE_ATTACKER, data);
      const ok = this.session.queueAttacker(msg.attackerType);
      console.log(`[GameRoom ${this.id}] 유닛 구매: ${msg.attackerType} → ${ok}`);
      if (!ok) this.reject(SocketEvent.QUEUE_ATTACKER, 'not enough gold');
    });

    this.socket.on(SocketEvent.START_ROUND, () => {
      const ok = this.session.startRound();
      console.log(`[GameRoom ${this.id}] 라운드 시작 요청 → ${ok}`);
      if (!ok) this.reject(SocketEvent.START_ROUND, 'round already in progress');
    });

    this.socket.on(SocketEvent.UPGRADE_ATTACKER, (data: unknown) => {
      const msg = parseUpgradeAttacker(data);
      if (!msg) return this.warnInvalid(SocketEvent.UPGRADE_ATTACKER, data);
      const ok = this.session.upgradeAttacker(msg.attackerType, msg.upgradeType);
      console.log(`[GameRoom ${this.id}] 업그레이드: ${msg.attackerType}/${msg.upgradeType} → ${ok}`);
      if (!ok) this.reject(SocketEvent.UPGRADE_ATTACKER, 'not enough gold');
    });

    this.socket.on(SocketEvent.PLACE_STRUCTURE, (data: unknown) => {
      const msg = parsePlaceStructure(data);
      if (!msg) return this.warnInvalid(SocketEvent.PLACE_STRUCTURE, data);
      const ok = this.session.placeStructure(msg.buildingType, msg.x, msg.y);
      console.log(`[GameRoom ${this.id}] 구조물 설치: (${msg.x},${msg.y}) ${msg.buildingType} → ${ok}`);
      if (!ok) this.reject(SocketEvent.PLACE_STRUCTURE, 'invalid placement');
    });

    this.socket.on(SocketEvent.REMOVE_STRUCTURE, (data: unknown) => {
      const msg = parseRemoveStructure(data);
      if (!msg) return this.warnInvalid(SocketEvent.REMOVE_STRUCTURE, data);
      const ok = this.session.removeStructure(msg.x, msg.y);
      console.log(`[GameRoom ${this.id}] 구조물 제거: (${msg.x},${msg.y}) → ${ok}`);
      if (!ok) this.reject(SocketEvent.REMOVE_STRUCTURE, 'no structure at cell');
    });

    this.socket.on(SocketEvent.SET_SPEED, (data: unknown) => {
      const msg = parseSetSpeed(data);
      if (!msg) return this.warnInvalid(SocketEvent.SET_SPEED, data);
      const speedMsg: SpeedChangedMsg = { speed: this.session.setSpeed(msg.speed) };
      this.socket.emit(SocketEvent.SPEED_CHANGED, speedMsg);
    });

    this.socket.on('disconnect', () => {
      console.log(`[GameRoom ${this.id}] 플레이어 연결 끊김`);
      this.stop();
    });

    // 서버 틱 시작
    this.lastTickTime = Date.now();
    this.tickTimer = setInterval(() => this.tick(), this.tickIntervalMs);

    console.log(`[GameRoom ${this.id}] 게임 시작`);
  }

  private tick(): void {
    const now = Date.now();
    const elapsedMs = now - this.lastTickTime;
    this.lastTickTime = now;
    this.session.step(elapsedMs / 1000);

    this.sinceSnapshotMs += elapsedMs;
    if (this.sinceSnapshotMs >= SNAPSHOT_INTERVAL_MS) {
      this.sinceSnapshotMs = 0;
      const snapshot: StateSnapshotMsg = this.session.getState();
      this.socket.emit(SocketEvent.STATE_SNAPSHOT, snapshot);
    }
  }

  stop(): void {
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }

    // 소켓 이벤트 리스너 정리
    for (const event of INPUT_EVENTS) {
      this.socket.removeAllListeners(event);
    }

    this.onDestroy?.();
    console.log(`[GameRoom ${this.id}] 게임 종료`);
  }

  private reject(action: string, reason: string): void {
    const msg: ActionRejectedMsg = { action, reason };
    this.socket.emit(SocketEvent.ACTION_REJECTED, msg);
  }

  private warnInvalid(event: string, data: unknown): void {
    console.warn(`[GameRoom ${this.id}] 잘못된 ${event} payload 무시: ${JSON.stringify(data)}`);
  }
}
