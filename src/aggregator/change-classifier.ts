import type { ChangeDirection } from "./types.js";

/**
 * Direction of a field relative to its previous value.
 *
 * Equality is exact: feed prices arrive already quantized to the tick size,
 * so a tolerance would only hide rounding bugs upstream.
 */
export function classifyChange(current: number, previous: number | null | undefined): ChangeDirection {
  if (previous === null || previous === undefined) return "first_observation";
  if (current > previous) return "up";
  if (current < previous) return "down";
  return "unchanged";
}

/** Arrow used by the quote table; first observations render blank. */
export function changeArrow(direction: ChangeDirection | null): string {
  switch (direction) {
    case "up":
      return "↑";
    case "down":
      return "↓";
    case "unchanged":
      return "=";
    default:
      return " ";
  }
}
