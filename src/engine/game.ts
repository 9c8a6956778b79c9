import {
  DEFAULT_CONFIG,
  EMPTY,
  GameStatus,
  type Board,
  type GameConfig,
  type GameParams,
  type Highlight,
} from "./types";
import { formatBoard, isComplete, maxEntryValue, regionHighlights } from "./board";
import { assertValidParams } from "./params";
import { decodeDescription, encodeDescription, formatEdit, formatSolution, parseMove } from "./description";
import { buildPuzzle } from "./puzzle";
import { solve } from "./solver";
import { createRng } from "./rng";
import { UnsolvableError } from "./errors";
import { createLogger } from "./log";

const log = createLogger("game");

/** Clues and grid size; shared by every snapshot of one puzzle, never mutated */
export interface SharedPuzzle {
  readonly params: Readonly<GameParams>;
  readonly clues: readonly number[];
}

function share(params: GameParams, clues: Board): SharedPuzzle {
  return Object.freeze({
    params: Object.freeze({ width: params.width, height: params.height }),
    clues: Object.freeze(clues.slice()),
  });
}

/**
 * One immutable snapshot of a game. Moves produce new snapshots that share
 * the clue set and carry their own copy of the board, so older snapshots
 * stay usable as undo history.
 */
export class Game {
  readonly shared: SharedPuzzle;
  readonly completed: boolean;
  readonly cheated: boolean;
  private readonly cells: Board;

  private constructor(shared: SharedPuzzle, cells: Board, completed: boolean, cheated: boolean) {
    this.shared = shared;
    this.cells = cells;
    this.cheated = cheated;
    this.completed = completed || isComplete(cells, shared.params.width, shared.params.height);
  }

  /** Generate a fresh puzzle; without a seed, the current time is used */
  static create(config: Partial<GameConfig> = {}): Game {
    const { width, height } = { ...DEFAULT_CONFIG, ...config };
    const seed = config.seed ?? Date.now();
    assertValidParams({ width, height });
    const puzzle = buildPuzzle(width, height, createRng(seed));
    return Game.fromClues({ width, height }, puzzle.clues);
  }

  /** Load a puzzle from its clue string; throws on bad params or description */
  static fromDescription(params: GameParams, desc: string): Game {
    assertValidParams(params);
    return Game.fromClues(params, decodeDescription(params, desc));
  }

  private static fromClues(params: GameParams, clues: Board): Game {
    const shared = share(params, clues);
    return new Game(shared, clues.slice(), false, false);
  }

  get width(): number {
    return this.shared.params.width;
  }

  get height(): number {
    return this.shared.params.height;
  }

  get board(): readonly number[] {
    return this.cells;
  }

  get description(): string {
    return encodeDescription(this.shared.clues);
  }

  get status(): GameStatus {
    return this.completed ? GameStatus.Completed : GameStatus.Playing;
  }

  /** Largest number a player may enter */
  get maxValue(): number {
    return maxEntryValue(this.width, this.height);
  }

  isClue(index: number): boolean {
    return this.shared.clues[index] !== EMPTY;
  }

  /**
   * Move string for typing `value` into `index`: "" when nothing would
   * change, null when the cell is a clue or the value is out of range.
   */
  editMove(index: number, value: number): string | null {
    const sz = this.width * this.height;
    if (!Number.isInteger(index) || index < 0 || index >= sz) return null;
    if (!Number.isInteger(value) || value < 0 || value > this.maxValue) return null;
    if (this.isClue(index)) return null;
    if (this.cells[index] === value) return "";
    return formatEdit(index, value);
  }

  /** New snapshot with `move` applied, or null (this snapshot untouched) if it is rejected */
  applyMove(move: string): Game | null {
    const parsed = parseMove(move, this.cells.length);
    if (!parsed) {
      log.debug(`rejected malformed move "${move}"`);
      return null;
    }

    if (parsed.kind === "solution") {
      return new Game(this.shared, parsed.cells, this.completed, true);
    }

    if (parsed.value > this.maxValue || this.isClue(parsed.index)) {
      log.debug(`rejected move "${move}"`);
      return null;
    }
    const cells = this.cells.slice();
    cells[parsed.index] = parsed.value;
    return new Game(this.shared, cells, this.completed, this.cheated);
  }

  /** Solution move for the puzzle's clues */
  solve(): string {
    const result = solve(this.shared.clues, this.width, this.height);
    if (!result.solved) throw new UnsolvableError();
    return formatSolution(result.board);
  }

  highlights(): Highlight[] {
    return regionHighlights(this.cells, this.width, this.height);
  }

  toText(): string {
    return formatBoard(this.cells, this.width, this.height);
  }
}
