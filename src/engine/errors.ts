export type FillominoErrorCode = "params" | "description" | "unsolvable";

export class FillominoError extends Error {
  constructor(
    message: string,
    public readonly code: FillominoErrorCode,
  ) {
    super(message);
    this.name = "FillominoError";
  }
}

/** Width or height out of range */
export class ParamsError extends FillominoError {
  constructor(message: string) {
    super(message, "params");
    this.name = "ParamsError";
  }
}

/** Malformed clue string */
export class DescriptionError extends FillominoError {
  constructor(message: string) {
    super(message, "description");
    this.name = "DescriptionError";
  }
}

/** The solver stalled before filling the grid */
export class UnsolvableError extends FillominoError {
  constructor(message = "Sorry, I couldn't find a solution") {
    super(message, "unsolvable");
    this.name = "UnsolvableError";
  }
}
