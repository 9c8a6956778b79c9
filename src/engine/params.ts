import { z } from "zod";
import { PRESETS, type GameParams } from "./types";
import { ParamsError } from "./errors";

export const GameParamsSchema = z.object({
  width: z.number().int().min(1, "Width must be at least one"),
  height: z.number().int().min(1, "Height must be at least one"),
});

function leadingInt(s: string | undefined): number {
  return s ? parseInt(s, 10) : 0;
}

/** "7x5" is 7 wide and 5 high; "7" alone means 7x7 */
export function decodeParams(s: string): GameParams {
  const m = /^(\d*)(x(\d*))?/.exec(s);
  const width = leadingInt(m?.[1]);
  const height = m?.[2] !== undefined ? leadingInt(m[3]) : width;
  return { width, height };
}

export function encodeParams(params: GameParams): string {
  return `${params.width}x${params.height}`;
}

/** First problem with `params`, or null */
export function validateParams(params: GameParams): string | null {
  const result = GameParamsSchema.safeParse(params);
  if (result.success) return null;
  return result.error.issues[0]?.message ?? "Invalid parameters";
}

export function assertValidParams(params: GameParams): void {
  const error = validateParams(params);
  if (error !== null) throw new ParamsError(error);
}

export function presets(): { name: string; params: GameParams }[] {
  return PRESETS.map((params) => ({ name: encodeParams(params), params: { ...params } }));
}
