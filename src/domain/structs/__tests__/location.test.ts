//
//
//

import { GridSize, GridSnapshot, Position } from '../index';

describe('Position', () => {
  const size = new GridSize(4, 5);

  test('converts to and from a row-major index', () => {
    const position = new Position(2, 3);

    expect(position.toIndex(size)).toBe(13);
    expect(Position.fromIndex(13, size).equals(position)).toBe(true);
  });

  test.each([
    [0, 0, 3],
    [0, 2, 5],
    [3, 4, 3],
    [1, 1, 8],
  ])('(%i, %i) has %i in-bounds neighbours', (row, column, expected) => {
    expect(new Position(row, column).neighbours(size)).toHaveLength(expected);
  });

  test('a 1x1 grid has no neighbours', () => {
    expect(new Position(0, 0).neighbours(new GridSize(1, 1))).toEqual([]);
  });

  test.each([
    [-1, 0],
    [0, -1],
    [4, 0],
    [0, 5],
    [1.5, 2],
  ])('(%p, %p) is not valid', (row, column) => {
    expect(new Position(row, column).isValid(size)).toBe(false);
  });

  test('translate moves by the given offsets', () => {
    expect(new Position(1, 2).translate(3, -1).hash()).toBe('4,1');
  });
});

describe('GridSnapshot', () => {
  test('copies a row-major buffer', () => {
    const snapshot = GridSnapshot.fromBuffer(new GridSize(2, 3), 4, Uint8Array.from([0, 1, 0, 0, 0, 1]));

    expect(snapshot.generation).toBe(4);
    expect(snapshot.rows).toBe(2);
    expect(snapshot.columns).toBe(3);
    expect(snapshot.cells).toEqual([
      [false, true, false],
      [false, false, true],
    ]);
    expect(snapshot.aliveCount()).toBe(2);
    expect(snapshot.isAlive(new Position(1, 2))).toBe(true);
    expect(snapshot.isAlive(new Position(1, 3))).toBe(false);
  });

  test('does not alias the source buffer', () => {
    const buffer = Uint8Array.from([1, 0, 0, 0]);
    const snapshot = GridSnapshot.fromBuffer(new GridSize(2, 2), 0, buffer);

    buffer[0] = 0;

    expect(snapshot.isAlive(new Position(0, 0))).toBe(true);
  });

  test('equals compares size, generation and cells', () => {
    const size = new GridSize(1, 2);
    const a = GridSnapshot.fromBuffer(size, 1, Uint8Array.from([1, 0]));

    expect(a.equals(GridSnapshot.fromBuffer(size, 1, Uint8Array.from([1, 0])))).toBe(true);
    expect(a.equals(GridSnapshot.fromBuffer(size, 2, Uint8Array.from([1, 0])))).toBe(false);
    expect(a.equals(GridSnapshot.fromBuffer(size, 1, Uint8Array.from([0, 1])))).toBe(false);
  });
});
