export enum DamageType {
  Magic = 'Magic',
  Piercing = 'Piercing',
  Crushing = 'Crushing',
  Explosive = 'Explosive',
}
