//
//
//

import { GridSize } from './grid';

// ---------------------------------------------------------------------------
// Position
// ---------------------------------------------------------------------------

export class Position {
  public constructor(public readonly row: number, public readonly column: number) {}

  public static fromIndex(index: number, size: GridSize): Position {
    const row = Math.floor(index / size.columns);
    const column = index % size.columns;
    return new Position(row, column);
  }

  /**
   * Returns the index of this position in a row-major buffer.
   * The position is assumed to be valid for the given size.
   */
  public toIndex(size: GridSize): number {
    return this.row * size.columns + this.column;
  }

  public translate(rowOffset: number, columnOffset: number): Position {
    return new Position(this.row + rowOffset, this.column + columnOffset);
  }

  /**
   * Returns the positions surrounding this one (orthogonal and diagonal)
   * that lie inside the grid. Corners have 3, edges 5, interior cells 8.
   */
  public neighbours(size: GridSize): Position[] {
    const positions: Position[] = [];

    for (let dr = -1; dr <= 1; dr += 1) {
      for (let dc = -1; dc <= 1; dc += 1) {
        if (dr === 0 && dc === 0) {
          continue;
        }

        const neighbour = this.translate(dr, dc);
        if (neighbour.isValid(size)) {
          positions.push(neighbour);
        }
      }
    }

    return positions;
  }

  public isValid(size: GridSize): boolean {
    return (
      Number.isInteger(this.row) &&
      Number.isInteger(this.column) &&
      this.row >= 0 &&
      this.row < size.rows &&
      this.column >= 0 &&
      this.column < size.columns
    );
  }

  public equals(other: Position): boolean {
    return this.row === other.row && this.column === other.column;
  }

  public hash(): string {
    return `${this.row},${this.column}`;
  }

  public toString(): string {
    return `(${this.row}, ${this.column})`;
  }
}
