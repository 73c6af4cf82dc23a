import {
  AttackerType,
  BuildingType,
  UpgradeType,
  isEnumValue,
  isFiniteNumber,
  isRecord,
} from '@tower-siege/shared';
import type {
  PlaceStructureMsg,
  QueueAttackerMsg,
  RemoveStructureMsg,
  SetSpeedMsg,
  UpgradeAttackerMsg,
} from '@tower-siege/shared';

// 소켓 payload 검증. 잘못된 입력은 null

const isCellCoordinate = (value: unknown): value is number =>
  isFiniteNumber(value) && Number.isInteger(value);

export function parseQueueAttacker(data: unknown): QueueAttackerMsg | null {
  if (!isRecord(data)) return null;
  const { attackerType } = data;
  if (!isEnumValue(AttackerType, attackerType)) return null;
  return { attackerType };
}

export function parseUpgradeAttacker(data: unknown): UpgradeAttackerMsg | null {
  if (!isRecord(data)) return null;
  const { attackerType, upgradeType } = data;
  if (!isEnumValue(AttackerType, attackerType) || !isEnumValue(UpgradeType, upgradeType)) return null;
  return { attackerType, upgradeType };
}

export function parsePlaceStructure(data: unknown): PlaceStructureMsg | null {
  if (!isRecord(data)) return null;
  const { x, y, buildingType } = data;
  if (!isCellCoordinate(x) || !isCellCoordinate(y) || !isEnumValue(BuildingType, buildingType)) return null;
  return { x, y, buildingType };
}

export function parseRemoveStructure(data: unknown): RemoveStructureMsg | null {
  if (!isRecord(data)) return null;
  const { x, y } = data;
  if (!isCellCoordinate(x) || !isCellCoordinate(y)) return null;
  return { x, y };
}

export function parseSetSpeed(data: unknown): SetSpeedMsg | null {
  if (!isRecord(data)) return null;
  const { speed } = data;
  if (!isFiniteNumber(speed) || speed <= 0) return null;
  return { speed };
}
