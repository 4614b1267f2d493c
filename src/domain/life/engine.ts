//
//
//

import { Logger } from 'winston';

import { MathRandomSource, getLogger } from '../../utils';
import { InvalidDimensionError, InvalidParameterError } from '../errors';
import { RandomSource } from '../ports';
import { GridSize, GridSnapshot, Position } from '../structs';

/**
 * Game of Life on a bounded grid.
 *
 * Cells live in a row-major byte buffer (1 = alive). A step counts the
 * neighbours of every cell into a scratch buffer, writes the next state into
 * a second buffer and swaps the two, so the current generation is never
 * read and written in the same pass.
 */
export class LifeEngine {
  private readonly _size: GridSize;

  private _cells: Uint8Array;

  private _next: Uint8Array;

  private readonly _counts: Uint8Array;

  private _generation = 0;

  private readonly _random: RandomSource;

  private readonly _logger: Logger;

  /**
   * @param random source used by {@link randomize}; pass a seeded one for
   * reproducible grids.
   * @throws InvalidDimensionError if rows or columns is not a positive integer.
   */
  public constructor(rows: number, columns: number, random: RandomSource = new MathRandomSource()) {
    if (!Number.isInteger(rows) || !Number.isInteger(columns) || rows <= 0 || columns <= 0) {
      throw new InvalidDimensionError(rows, columns);
    }

    this._size = new GridSize(rows, columns);
    this._cells = new Uint8Array(this._size.area);
    this._next = new Uint8Array(this._size.area);
    this._counts = new Uint8Array(this._size.area);
    this._random = random;
    this._logger = getLogger('engine');
  }

  public get size(): GridSize {
    return this._size;
  }

  public get generation(): number {
    return this._generation;
  }

  /**
   * Sets every cell alive with probability `density`, independently.
   * Resets the generation counter.
   *
   * @throws InvalidParameterError if density is outside [0, 1].
   */
  public randomize(density: number): void {
    if (Number.isNaN(density) || density < 0 || density > 1) {
      throw new InvalidParameterError('density', density, 'a number in [0, 1]');
    }

    for (let i = 0; i < this._cells.length; i += 1) {
      this._cells[i] = this._random.next() < density ? 1 : 0;
    }
    this._generation = 0;

    this._logger.debug(`randomized ${this._size.toString()} grid with density ${density}`);
  }

  /**
   * Brings the given positions to life, leaving every other cell as it is.
   * Positions outside the grid are ignored. Resets the generation counter.
   *
   * Callers holding (row, column) pairs wrap them in {@link Position}s first;
   * the cells of a PatternLibrary pattern already are.
   */
  public populate(positions: Iterable<Position>): void {
    let placed = 0;
    let ignored = 0;

    for (const position of positions) {
      if (position.isValid(this._size)) {
        this._cells[position.toIndex(this._size)] = 1;
        placed += 1;
      } else {
        ignored += 1;
      }
    }
    this._generation = 0;

    this._logger.debug(`populated ${placed} cells (${ignored} out of bounds)`);
  }

  /**
   * Kills every cell and resets the generation counter.
   */
  public clear(): void {
    this._cells.fill(0);
    this._generation = 0;
  }

  /**
   * Advances the grid by one generation.
   */
  public step(): void {
    const { rows, columns } = this._size;
    const cells = this._cells;
    const counts = this._counts;
    const next = this._next;

    counts.fill(0);
    for (let r = 0; r < rows; r += 1) {
      const rowStart = Math.max(r - 1, 0);
      const rowEnd = Math.min(r + 1, rows - 1);

      for (let c = 0; c < columns; c += 1) {
        const colStart = Math.max(c - 1, 0);
        const colEnd = Math.min(c + 1, columns - 1);

        let sum = 0;
        for (let nr = rowStart; nr <= rowEnd; nr += 1) {
          for (let nc = colStart; nc <= colEnd; nc += 1) {
            if (nr !== r || nc !== c) {
              sum += cells[nr * columns + nc];
            }
          }
        }
        counts[r * columns + c] = sum;
      }
    }

    for (let i = 0; i < cells.length; i += 1) {
      const n = counts[i];
      next[i] = n === 3 || (n === 2 && cells[i] === 1) ? 1 : 0;
    }

    this._next = cells;
    this._cells = next;
    this._generation += 1;
  }

  /**
   * Advances the grid by `n` generations.
   *
   * @throws InvalidParameterError if n is not a non-negative integer.
   */
  public stepN(n: number): void {
    if (!Number.isInteger(n) || n < 0) {
      throw new InvalidParameterError('n', n, 'a non-negative integer');
    }

    for (let i = 0; i < n; i += 1) {
      this.step();
    }

    if (n > 0) {
      this._logger.debug(`advanced ${n} generations to ${this._generation}`);
    }
  }

  public isAlive(position: Position): boolean {
    return position.isValid(this._size) && this._cells[position.toIndex(this._size)] === 1;
  }

  public aliveCount(): number {
    let count = 0;
    for (const cell of this._cells) {
      count += cell;
    }
    return count;
  }

  /**
   * Returns the number of alive cells among the in-bounds neighbours of the
   * given position.
   */
  public neighbourCount(position: Position): number {
    return position
      .neighbours(this._size)
      .reduce((sum, neighbour) => sum + this._cells[neighbour.toIndex(this._size)], 0);
  }

  public snapshot(): GridSnapshot {
    return GridSnapshot.fromBuffer(this._size, this._generation, this._cells);
  }
}
