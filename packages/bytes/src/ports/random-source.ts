/**
 * Source of uniformly distributed numbers in `[0, 1)`.
 *
 * Inject a seeded implementation to make shuffles reproducible.
 */
export interface RandomSource {
  next(): number
}
