// Enums
export { AttackerType, ALL_ATTACKER_TYPES } from './enums/AttackerType';
export { BuildingType, ALL_BUILDING_TYPES } from './enums/BuildingType';
export { DamageType } from './enums/DamageType';
export { UpgradeType, UpgradeEffectType } from './enums/UpgradeType';

// Core - types
export type { GridNode } from './core/GridNode';
export type { Vector2, BoundingBox } from './core/Vector2';
export type { FieldSlot, FieldData } from './core/TowerField';
export type {
  BuildingDefinition, WallDefinition, DefenderDefinition,
  DefenderAttack, ProjectileAttack, SplashAttack,
} from './core/BuildingRegistry';
export type { AttackerTemplate, UpgradeInfo } from './core/AttackerStats';
export type { ProjectileTarget, ProjectileMotion, ProjectileInit } from './core/ProjectileModel';
export type { DefenderResources, AttackerResources, RoundStats } from './core/ResourceStore';
export type {
  SimulationEvent, SimulationEventType,
  DamageEvent, KillEvent, ReachedEndEvent, FieldModifiedEvent,
  RoundStartedEvent, RoundOverEvent, StructurePlacedEvent, StructureRemovedEvent,
  AttackerSpawnedEvent, ProjectileFiredEvent, ProjectileExpiredEvent,
} from './core/SimulationEvents';
export type { SimulationConfig } from './core/SimulationState';
export type { SimulatorDependencies } from './core/TowerDefenseSimulator';

// Core - values
export {
  gridNode, nodeKey, sameNode, manhattanDistance,
  getSuccessors, getAllNeighbors, getSelfWithSuccessors,
} from './core/GridNode';
export {
  vectorLength, vectorDistance, subtractVectors, scaleVector,
  normalizeOrZero, lerpVector, clamp, boxesOverlap,
} from './core/Vector2';
export { TowerField, SLOT_SIZE, DEFAULT_FIELD_DATA } from './core/TowerField';
export { PathModel } from './core/PathModel';
export { findPath, hasPath } from './core/PathFinder';
export { RepeatingTimer } from './core/RepeatingTimer';
export { BuildingRegistry, parseBuildingDefinitions, createBuildingRegistry } from './core/BuildingRegistry';
export { AttackerStats, parseAttackerDefinitions, createAttackerStats } from './core/AttackerStats';
export { AttackerModel } from './core/AttackerModel';
export { StructureModel, DefenderComponent } from './core/StructureModel';
export { ProjectileModel, PROJECTILE_MAX_AGE } from './core/ProjectileModel';
export { BountyEscrow, createRoundStats } from './core/ResourceStore';
export { RoundModel } from './core/RoundModel';
export { EventLog } from './core/SimulationEvents';
export { SimulationState, DEFAULT_SIMULATION_CONFIG } from './core/SimulationState';
export { TowerDefenseSimulator } from './core/TowerDefenseSimulator';
export {
  isRecord, isFiniteNumber, isEnumValue,
  requireNumber, requireString, requireBoolean, requireEnum, requireRecord, requireVector,
} from './core/validation';

// Types
export type {
  QueueAttackerMsg, UpgradeAttackerMsg, PlaceStructureMsg, RemoveStructureMsg, SetSpeedMsg,
  SessionStartedMsg, ActionRejectedMsg, SpeedChangedMsg, StateSnapshotMsg, SimulationEventMsg,
} from './types/NetworkMessage';
export { SocketEvent } from './types/NetworkMessage';

export type {
  AttackerState, StructureState, ProjectileState, GameState,
} from './types/GameState';
