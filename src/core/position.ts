import { ConfigurationError } from "./errors.js";

/**
 * Where a slot's tokens go in the argument list.
 *
 * Template documents encode this as a signed integer:
 *   n >= 0        absolute index from the start
 *   -1            append
 *   -99 .. -2     end-relative; -2 goes before the last token, -3 before the last two, ...
 *   -100          never placed on the command line (the file is still staged)
 */
export type Position =
  | { kind: "absolute"; index: number }
  | { kind: "fromEnd"; offset: number }
  | { kind: "suppressed" };

export const SUPPRESSED_POSITION = -100;
const MIN_FROM_END = -99;

export function parsePosition(raw: number): Position {
  if (!Number.isInteger(raw)) {
    throw new ConfigurationError(`slot position must be an integer, got ${String(raw)}`);
  }
  if (raw >= 0) return { kind: "absolute", index: raw };
  if (raw === SUPPRESSED_POSITION) return { kind: "suppressed" };
  if (raw >= MIN_FROM_END) return { kind: "fromEnd", offset: -raw - 1 };
  throw new ConfigurationError(`slot position out of range: ${raw} (expected >= ${MIN_FROM_END} or ${SUPPRESSED_POSITION})`);
}

export function positionToNumber(position: Position): number {
  switch (position.kind) {
    case "absolute":
      return position.index;
    case "fromEnd":
      return -position.offset - 1;
    case "suppressed":
      return SUPPRESSED_POSITION;
  }
}

/** Index an insertion would land at for a list of `length`, or null when suppressed. */
export function resolveInsertIndex(length: number, position: Position): number | null {
  switch (position.kind) {
    case "absolute":
      return Math.min(position.index, length);
    case "fromEnd":
      return Math.max(0, length - position.offset);
    case "suppressed":
      return null;
  }
}

/** Inserts in place and returns the same list. */
export function insertArgument<T>(list: T[], arg: T, position: Position): T[] {
  const index = resolveInsertIndex(list.length, position);
  if (index !== null) list.splice(index, 0, arg);
  return list;
}
