import { EMPTY, type Board, type Highlight } from "./types";
import { Partition } from "./partition";
import { shuffle, type Rng } from "./rng";
import { createLogger } from "./log";

const log = createLogger("board");

// left, right, up, down
const DX = [-1, 1, 0, 0];
const DY = [0, 0, -1, 1];

export function neighbours(i: number, w: number, h: number): number[] {
  const x = i % w;
  const y = Math.floor(i / w);
  const out: number[] = [];
  for (let k = 0; k < 4; k++) {
    const nx = x + DX[k];
    const ny = y + DY[k];
    if (nx < 0 || nx >= w || ny < 0 || ny >= h) continue;
    out.push(ny * w + nx);
  }
  return out;
}

/**
 * Largest region the generator uses. 2x2 is the odd one out: it has no
 * valid partition with regions no larger than 2, hence the floor of 3.
 */
export function maxRegionSize(w: number, h: number): number {
  return Math.min(Math.max(w, h, 3), 9);
}

/** Largest value a player may enter: the longer side, or 3 on a 2x2 grid */
export function maxEntryValue(w: number, h: number): number {
  if (w === 2 && h === 2) return 3;
  return Math.min(Math.max(w, h), 9);
}

/** Partition merging every pair of adjacent cells with equal values (empty cells included) */
export function buildPartition(board: readonly number[], w: number, h: number): Partition {
  const dsf = new Partition(w * h);
  for (let i = 0; i < w * h; i++) {
    for (const n of neighbours(i, w, h)) {
      if (board[i] === board[n]) dsf.merge(i, n);
    }
  }
  return dsf;
}

export interface GeneratedBoard {
  cells: Board;
  attempts: number;
}

interface Conflict {
  a: number;
  b: number;
  // a neighbouring set of a different size, merged into `a` in preference to `b`
  c: number | null;
}

function findConflict(dsf: Partition, order: readonly number[], w: number, h: number): Conflict | null {
  for (const cell of order) {
    const a = dsf.canonify(cell);
    let conflict: Conflict | null = null;
    let other: number | null = null;
    for (const n of neighbours(cell, w, h)) {
      const b = dsf.canonify(n);
      if (a === b) continue;
      if (dsf.size(a) === dsf.size(b)) {
        conflict = { a, b, c: null };
      } else if (other === null) {
        other = b;
      }
    }
    if (conflict) {
      conflict.c = other;
      return conflict;
    }
  }
  return null;
}

// Start from singletons and keep merging a region that touches an equal-sized
// neighbour. When a merge overshoots the size cap, throw the attempt away and
// reshuffle the scan order.
export function generateBoard(w: number, h: number, rng: Rng): GeneratedBoard {
  const sz = w * h;
  const maxSize = maxRegionSize(w, h);
  const dsf = new Partition(sz);
  const order = Array.from({ length: sz }, (_, i) => i);

  for (let attempts = 1; ; attempts++) {
    shuffle(order, rng);
    for (;;) {
      const conflict = findConflict(dsf, order, w, h);
      if (!conflict) {
        const cells = Array.from({ length: sz }, (_, i) => dsf.size(i));
        log.debug(`generated ${w}x${h} board after ${attempts} attempt(s)`);
        return { cells, attempts };
      }
      dsf.merge(conflict.a, conflict.c ?? conflict.b);
      if (dsf.size(conflict.a) > maxSize) break;
    }
    dsf.reset();
  }
}

/** Every cell equals the size of its equal-valued region (so no cell is empty) */
export function isComplete(board: readonly number[], w: number, h: number): boolean {
  const dsf = buildPartition(board, w, h);
  for (let i = 0; i < w * h; i++) {
    if (board[i] !== dsf.size(i)) return false;
  }
  return true;
}

export function regionHighlights(board: readonly number[], w: number, h: number): Highlight[] {
  const dsf = buildPartition(board, w, h);
  return board.map((v, i): Highlight => {
    if (v === EMPTY) return "none";
    const size = dsf.size(i);
    if (size === v) return "correct";
    return size > v ? "error" : "none";
  });
}

/**
 * Plain-text grid, e.g. for a 2x1 board [2, 0]:
 *
 *   +---+---+
 *   | 2 |   |
 *   +---+---+
 */
export function formatBoard(board: readonly number[], w: number, h: number): string {
  const fence = "+---".repeat(w) + "+\n";
  let out = fence;
  for (let y = 0; y < h; y++) {
    let line = "";
    for (let x = 0; x < w; x++) {
      const v = board[y * w + x];
      line += `| ${v === EMPTY ? " " : String(v)} `;
    }
    out += line + "|\n" + fence;
  }
  return out;
}
