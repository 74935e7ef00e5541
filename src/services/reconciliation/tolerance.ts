export const RELATIVE_TOLERANCE = 1e-5;

/**
 * Relative comparison with no absolute floor: |a - b| <= rtol * max(|a|, |b|).
 * Scaling both sides by the same factor never changes the outcome. A
 * non-finite value is only close to itself.
 */
export function isClose(a: number, b: number, relativeTolerance: number = RELATIVE_TOLERANCE): boolean {
  if (a === b) return true;
  if (!Number.isFinite(a) || !Number.isFinite(b)) return false;
  return Math.abs(a - b) <= relativeTolerance * Math.max(Math.abs(a), Math.abs(b));
}
