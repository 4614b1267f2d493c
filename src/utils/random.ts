//
//
//

import { all, create, MathJsInstance } from 'mathjs';

import { RandomSource } from '../domain/ports';

/**
 * Unseeded source backed by Math.random.
 */
export class MathRandomSource implements RandomSource {
  public next(): number {
    return Math.random();
  }
}

/**
 * Reproducible source: two instances built from the same seed yield the
 * same sequence.
 */
export class SeededRandomSource implements RandomSource {
  private readonly _math: MathJsInstance;

  public constructor(public readonly seed: string) {
    this._math = create(all, { randomSeed: seed });
  }

  public next(): number {
    return this._math.random();
  }
}
