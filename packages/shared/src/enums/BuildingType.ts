export enum BuildingType {
  Wall = 'Wall',
  Arrow = 'Arrow',
  Cannon = 'Cannon',
}

export const ALL_BUILDING_TYPES: readonly BuildingType[] = [
  BuildingType.Wall,
  BuildingType.Arrow,
  BuildingType.Cannon,
];
