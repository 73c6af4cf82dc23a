import { GridNode, getSuccessors, manhattanDistance, nodeKey, sameNode } from './GridNode';
import { PathModel } from './PathModel';
import { TowerField } from './TowerField';

/** 탐색 노드. parent는 arena 인덱스 (-1 = 루트) */
interface SearchNode {
  node: GridNode;
  parent: number;
  g: number;
  f: number;
}

/**
 * A* 길찾기 (4방향, 맨해튼 휴리스틱, 간선 비용 1).
 * blocked를 주면 그 칸이 막혔다고 가정하고 탐색한다 (배치 what-if 용).
 * 경로가 없거나 전제 조건이 깨지면 null — 예외 아님.
 */
export function findPath(
  field: TowerField,
  start: GridNode,
  end: GridNode,
  blocked: GridNode | null = null,
): PathModel | null {
  if (blocked && (sameNode(blocked, start) || sameNode(blocked, end))) return null;
  if (!field.isInside(start) || !field.isInside(end)) return null;
  if (field.isBlocked(start) || field.isBlocked(end)) return null;
  // 이미 도착한 상태는 경로로 치지 않음
  if (sameNode(start, end)) return null;

  const arena: SearchNode[] = [{ node: start, parent: -1, g: 0, f: 0 }];
  // open은 arena 인덱스 목록, 선형 스캔으로 최소 f 선택
  const open: number[] = [0];
  const closed = new Set<string>();

  while (open.length > 0) {
    const minPos = findMinIndex(arena, open);
    const currentIndex = open[minPos];
    open.splice(minPos, 1);
    const current = arena[currentIndex];

    for (const next of getSuccessors(current.node)) {
      if (sameNode(next, end)) {
        arena.push({ node: next, parent: currentIndex, g: current.g + 1, f: current.g + 1 });
        return buildPath(arena, arena.length - 1);
      }
      if (blocked && sameNode(next, blocked)) continue;
      if (!field.isInside(next)) continue;
      if (field.isBlocked(next) || closed.has(nodeKey(next))) continue;

      const g = current.g + 1;
      const candidate: SearchNode = { node: next, parent: currentIndex, g, f: g + manhattanDistance(next, end) };
      replaceIfBetter(arena, open, candidate);
    }
    closed.add(nodeKey(current.node));
  }
  return null;
}

export function hasPath(field: TowerField, start: GridNode, end: GridNode, blocked: GridNode | null = null): boolean {
  return findPath(field, start, end, blocked) !== null;
}

// 최소 f 중 가장 앞의 것
function findMinIndex(arena: SearchNode[], open: number[]): number {
  let minPos = 0;
  let minF = Infinity;
  for (let i = 0; i < open.length; i++) {
    const f = arena[open[i]].f;
    if (f < minF) {
      minF = f;
      minPos = i;
    }
  }
  return minPos;
}

// 같은 칸이 open에 있으면 기존 f가 더 클 때만 교체, 없으면 추가
function replaceIfBetter(arena: SearchNode[], open: number[], candidate: SearchNode): void {
  for (let i = 0; i < open.length; i++) {
    const existing = arena[open[i]];
    if (!sameNode(existing.node, candidate.node)) continue;
    if (existing.f > candidate.f) {
      arena.push(candidate);
      open[i] = arena.length - 1;
    }
    return;
  }
  arena.push(candidate);
  open.push(arena.length - 1);
}

function buildPath(arena: SearchNode[], goalIndex: number): PathModel {
  const route: GridNode[] = [];
  for (let i = goalIndex; i !== -1; i = arena[i].parent) {
    route.push(arena[i].node);
  }
  route.reverse();
  return new PathModel(route);
}
