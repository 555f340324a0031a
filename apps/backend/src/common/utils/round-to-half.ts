/**
 * Rounds to the nearest half band. Ties go to the even half-step count, so
 * 6.25 -> 6 and 6.75 -> 7.
 */
export const roundToHalf = (value: number): number => {
  const halves = value * 2;
  const lower = Math.floor(halves);
  const fraction = halves - lower;
  if (fraction > 0.5) {
    return (lower + 1) / 2;
  }
  if (fraction < 0.5) {
    return lower / 2;
  }
  return (lower % 2 === 0 ? lower : lower + 1) / 2;
};
