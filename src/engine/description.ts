import type { Board, GameParams } from "./types";
import { maxRegionSize } from "./board";
import { DescriptionError } from "./errors";

/** First problem with a clue string for the given grid, or null */
export function validateDescription(params: GameParams, desc: string): string | null {
  const sz = params.width * params.height;
  const max = maxRegionSize(params.width, params.height);

  const n = Math.min(desc.length, sz);
  for (let i = 0; i < n; i++) {
    const ch = desc.charCodeAt(i) - 48;
    if (ch < 0 || ch > 9) return "non-digit in string";
    if (ch > max) return "too large digit in string";
  }
  if (desc.length > sz) return "string too long";
  if (desc.length < sz) return "string too short";
  return null;
}

export function decodeDescription(params: GameParams, desc: string): Board {
  const error = validateDescription(params, desc);
  if (error !== null) throw new DescriptionError(error);
  return Array.from(desc, (ch) => ch.charCodeAt(0) - 48);
}

export function encodeDescription(board: readonly number[]): string {
  return board.join("");
}

export type Move =
  | { kind: "edit"; index: number; value: number }
  | { kind: "solution"; cells: Board };

export function formatEdit(index: number, value: number): string {
  return `${index}_${value}`;
}

export function formatSolution(board: readonly number[]): string {
  return "s" + encodeDescription(board);
}

/**
 * Parse "<index>_<value>" or "s<digits>" against a grid of `sz` cells.
 * Returns null for anything malformed or out of range.
 */
export function parseMove(move: string, sz: number): Move | null {
  if (move.startsWith("s")) {
    const digits = move.slice(1);
    if (digits.length !== sz || !/^\d*$/.test(digits)) return null;
    return { kind: "solution", cells: Array.from(digits, (ch) => ch.charCodeAt(0) - 48) };
  }

  const m = /^(\d+)_(\d+)$/.exec(move);
  if (!m) return null;
  const index = parseInt(m[1], 10);
  const value = parseInt(m[2], 10);
  if (index >= sz || value > 9) return null;
  return { kind: "edit", index, value };
}
