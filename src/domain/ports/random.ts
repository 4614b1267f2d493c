//
//
//

/**
 * Source of uniformly distributed numbers used to seed the grid.
 */
export interface RandomSource {
    /**
     * @returns a number in [0, 1).
     */
    next(): number;
}
