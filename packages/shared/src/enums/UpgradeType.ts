export enum UpgradeType {
  Speed = 'Speed',
  Health = 'Health',
  Amount = 'Amount',
}

// Flat: 값에 더함, Factor: 값에 곱함
export enum UpgradeEffectType {
  Flat = 'Flat',
  Factor = 'Factor',
}
