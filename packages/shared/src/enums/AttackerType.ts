export enum AttackerType {
  OrcWarrior = 'OrcWarrior',
  Spider = 'Spider',
  Golem = 'Golem',
}

export const ALL_ATTACKER_TYPES: readonly AttackerType[] = [
  AttackerType.OrcWarrior,
  AttackerType.Spider,
  AttackerType.Golem,
];
