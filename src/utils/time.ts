//
//
//

// ---------------------------------------------------------------------------
// Duration
// ---------------------------------------------------------------------------

export class Duration {
  private constructor(private readonly _value: number) {}

  public static fromMilliseconds(milliseconds: number): Duration {
    return new Duration(milliseconds);
  }

  public static zero(): Duration {
    return new Duration(0);
  }

  public get milliseconds(): number {
    return this._value;
  }
}
