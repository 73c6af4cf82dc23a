export interface Vector2 {
  x: number;
  y: number;
}

export const vectorLength = (v: Vector2): number => Math.hypot(v.x, v.y);

export const vectorDistance = (a: Vector2, b: Vector2): number =>
  Math.hypot(a.x - b.x, a.y - b.y);

export const subtractVectors = (a: Vector2, b: Vector2): Vector2 => ({
  x: a.x - b.x,
  y: a.y - b.y,
});

export const scaleVector = (v: Vector2, factor: number): Vector2 => ({
  x: v.x * factor,
  y: v.y * factor,
});

/** 길이 0이면 영벡터 */
export const normalizeOrZero = (v: Vector2): Vector2 => {
  const length = vectorLength(v);
  if (length === 0) {
    return { x: 0, y: 0 };
  }
  return { x: v.x / length, y: v.y / length };
};

export const lerpVector = (from: Vector2, to: Vector2, factor: number): Vector2 => ({
  x: from.x + (to.x - from.x) * factor,
  y: from.y + (to.y - from.y) * factor,
});

export const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

export interface BoundingBox {
  position: Vector2;
  size: Vector2;
}

/** 겹치는 면적이 0보다 클 때만 true (모서리 접촉은 충돌 아님) */
export const boxesOverlap = (a: BoundingBox, b: BoundingBox): boolean => {
  const minX = Math.max(a.position.x, b.position.x);
  const maxX = Math.min(a.position.x + a.size.x, b.position.x + b.size.x);
  const minY = Math.max(a.position.y, b.position.y);
  const maxY = Math.min(a.position.y + a.size.y, b.position.y + b.size.y);
  return minX < maxX && minY < maxY;
};
