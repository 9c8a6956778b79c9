export interface GameParams {
  width: number;
  height: number;
}

export interface GameConfig extends GameParams {
  seed: number;
}

export enum GameStatus {
  Playing = "playing",
  Completed = "completed",
}

// "correct": region size equals its value, "error": region is overfull
export type Highlight = "none" | "correct" | "error";

/** Row-major cell values, 0 = empty */
export type Board = number[];

export const EMPTY = 0;

/** Default grid size; the seed is picked per game */
export const DEFAULT_CONFIG: GameParams = {
  width: 7,
  height: 7,
};

export const PRESETS: readonly GameParams[] = [
  { width: 5, height: 5 },
  { width: 7, height: 7 },
  { width: 9, height: 9 },
];
