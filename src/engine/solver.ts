import { EMPTY, type Board } from "./types";
import { Partition } from "./partition";
import { neighbours } from "./board";

export interface SolverResult {
  /** true when every cell was filled */
  solved: boolean;
  /** Working board at the point the solver stopped */
  board: Board;
  passes: number;
}

/**
 * Fill in the cells of `clues` that are forced, without ever guessing.
 *
 * Each pass visits every cell in index order:
 *
 *  - an empty cell is filled with a neighbour's value when that neighbour's
 *    region cannot reach its size through other empty or equal cells;
 *    failing that, it becomes a 1 when it has no empty neighbour and could
 *    not join any neighbouring region (and no neighbour is already a 1).
 *  - an incomplete region that can grow into exactly one empty cell without
 *    exceeding its size grows into it.
 *
 * Passes repeat until one makes no progress or the grid is full. A stall
 * means "not solvable by these rules", not "no solution".
 */
export function solve(clues: readonly number[], w: number, h: number): SolverResult {
  const sz = w * h;
  const board: Board = clues.slice();
  const dsf = new Partition(sz);
  const visited = new Uint8Array(sz);
  let empty = 0;

  for (let i = 0; i < sz; i++) {
    if (board[i] === EMPTY) {
      empty++;
      continue;
    }
    for (const n of neighbours(i, w, h)) {
      if (board[i] === board[n]) dsf.merge(i, n);
    }
  }

  // Size of the region `i` would end up in if it took value `v`
  function expandSize(i: number, v: number): number {
    const roots: number[] = [];
    let size = 1;
    for (const n of neighbours(i, w, h)) {
      if (board[n] !== v) continue;
      const root = dsf.canonify(n);
      if (roots.includes(root)) continue;
      roots.push(root);
      size += dsf.size(root);
    }
    return size;
  }

  // Cells reachable from `from` through empty cells and cells equal to
  // board[from], never entering `blocked`.
  function reachable(from: number, blocked: number): number {
    const v = board[from];
    const touched = [blocked, from];
    const stack = [from];
    visited[blocked] = 1;
    visited[from] = 1;
    let count = 0;
    for (let cur = stack.pop(); cur !== undefined; cur = stack.pop()) {
      count++;
      for (const n of neighbours(cur, w, h)) {
        if (visited[n] || (board[n] !== EMPTY && board[n] !== v)) continue;
        visited[n] = 1;
        touched.push(n);
        stack.push(n);
      }
    }
    for (const t of touched) visited[t] = 0;
    return count;
  }

  function fill(i: number, v: number): void {
    board[i] = v;
    for (const n of neighbours(i, w, h)) {
      if (board[n] === v) dsf.merge(i, n);
    }
    empty--;
  }

  function fillEmpty(i: number): void {
    let one = true;
    for (const n of neighbours(i, w, h)) {
      const v = board[n];
      if (v === EMPTY) {
        one = false;
        continue;
      }
      if (one && (v === 1 || v >= expandSize(i, v))) one = false;
      if (reachable(n, i) < v) {
        fill(i, v);
        return;
      }
    }
    if (one) fill(i, 1);
  }

  function growRegion(i: number): void {
    const v = board[i];
    if (dsf.canonify(i) !== i || dsf.size(i) === v) return;

    let candidate: number | null = null;
    for (const member of dsf.members(i)) {
      for (const n of neighbours(member, w, h)) {
        if (board[n] !== EMPTY || n === candidate) continue;
        if (expandSize(n, v) > v) continue;
        // two ways to grow: nothing forced yet
        if (candidate !== null) return;
        candidate = n;
      }
    }
    if (candidate !== null) fill(candidate, v);
  }

  let passes = 0;
  let before: number;
  do {
    before = empty;
    passes++;
    for (let i = 0; i < sz; i++) {
      if (board[i] === EMPTY) fillEmpty(i);
      else growRegion(i);
    }
  } while (empty < before && empty > 0);

  return { solved: empty === 0, board, passes };
}
