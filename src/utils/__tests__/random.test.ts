//
//
//

import { MathRandomSource, SeededRandomSource } from '../random';

function draw(source: { next(): number }, count: number): number[] {
  return Array.from({ length: count }, () => source.next());
}

describe('SeededRandomSource', () => {
  test('repeats the sequence for the same seed', () => {
    expect(draw(new SeededRandomSource('test-seed'), 10)).toEqual(draw(new SeededRandomSource('test-seed'), 10));
  });

  test('differs between seeds', () => {
    expect(draw(new SeededRandomSource('test-seed'), 10)).not.toEqual(draw(new SeededRandomSource('other-seed'), 10));
  });

  test('yields values in [0, 1)', () => {
    draw(new SeededRandomSource('test-seed'), 100).forEach((value) => {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    });
  });
});

describe('MathRandomSource', () => {
  test('yields values in [0, 1)', () => {
    draw(new MathRandomSource(), 100).forEach((value) => {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    });
  });
});
