/** 그리드 셀 좌표. 값으로 비교한다 */
export interface GridNode {
  readonly x: number;
  readonly y: number;
}

export function gridNode(x: number, y: number): GridNode {
  return { x, y };
}

export function nodeKey(node: GridNode): string {
  return `${node.x},${node.y}`;
}

export function sameNode(a: GridNode, b: GridNode): boolean {
  return a.x === b.x && a.y === b.y;
}

export function manhattanDistance(a: GridNode, b: GridNode): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

// 순서 고정: 서(x-1), 동(x+1), 북(y+1), 남(y-1). A* 동점 처리가 이 순서에 의존함
export function getSuccessors(node: GridNode): GridNode[] {
  return [
    gridNode(node.x - 1, node.y),
    gridNode(node.x + 1, node.y),
    gridNode(node.x, node.y + 1),
    gridNode(node.x, node.y - 1),
  ];
}

export function getAllNeighbors(node: GridNode): GridNode[] {
  return [
    ...getSuccessors(node),
    gridNode(node.x - 1, node.y - 1),
    gridNode(node.x + 1, node.y + 1),
    gridNode(node.x - 1, node.y + 1),
    gridNode(node.x + 1, node.y - 1),
  ];
}

export function getSelfWithSuccessors(node: GridNode): GridNode[] {
  return [node, ...getSuccessors(node)];
}
