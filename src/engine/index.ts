export { Game } from "./game";
export type { SharedPuzzle } from "./game";
export {
  neighbours,
  maxRegionSize,
  maxEntryValue,
  buildPartition,
  generateBoard,
  isComplete,
  regionHighlights,
  formatBoard,
} from "./board";
export type { GeneratedBoard } from "./board";
export { Partition } from "./partition";
export { createRng, shuffle } from "./rng";
export type { Rng } from "./rng";
export { solve } from "./solver";
export type { SolverResult } from "./solver";
export { buildPuzzle } from "./puzzle";
export type { Puzzle } from "./puzzle";
export {
  GameParamsSchema,
  decodeParams,
  encodeParams,
  validateParams,
  assertValidParams,
  presets,
} from "./params";
export {
  validateDescription,
  decodeDescription,
  encodeDescription,
  parseMove,
  formatEdit,
  formatSolution,
} from "./description";
export type { Move } from "./description";
export {
  FillominoError,
  ParamsError,
  DescriptionError,
  UnsolvableError,
} from "./errors";
export type { FillominoErrorCode } from "./errors";
export { createLogger, setLogLevel, getLogLevel } from "./log";
export type { Logger, LogLevel } from "./log";
export type {
  GameParams,
  GameConfig,
  Board,
  Highlight,
} from "./types";
export { GameStatus, DEFAULT_CONFIG, PRESETS, EMPTY } from "./types";
