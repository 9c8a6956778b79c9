import { EMPTY, type Board } from "./types";
import { generateBoard } from "./board";
import { solve } from "./solver";
import { encodeDescription } from "./description";
import type { Rng } from "./rng";
import { createLogger } from "./log";

const log = createLogger("puzzle");

export interface Puzzle {
  solution: Board;
  clues: Board;
  description: string;
}

/**
 * Generate a board, then try to blank each cell in turn, biggest regions
 * first, keeping the blank whenever the solver still fills the grid.
 *
 * One pass is enough as long as extra clues never stop the solver from
 * finishing: a clue kept now would also have to be kept with fewer clues
 * around it later.
 */
export function buildPuzzle(w: number, h: number, rng: Rng): Puzzle {
  const { cells: solution } = generateBoard(w, h, rng);
  const order = Array.from({ length: w * h }, (_, i) => i).sort(
    (a, b) => solution[b] - solution[a],
  );

  const clues = solution.slice();
  for (const i of order) {
    clues[i] = EMPTY;
    if (!solve(clues, w, h).solved) clues[i] = solution[i];
  }

  const kept = clues.filter((v) => v !== EMPTY).length;
  log.debug(`${w}x${h} puzzle keeps ${kept} of ${w * h} clues`);
  return { solution, clues, description: encodeDescription(clues) };
}
