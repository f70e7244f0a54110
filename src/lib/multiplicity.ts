import { InvalidValueError } from './errors.js';

/** Stand-in for an unbounded upper multiplicity. */
export const UNLIMITED_MAX_MULTIPLICITY = 9999;

export type MaxMultiplicity = number | '*';

const isBound = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value >= 0;

/**
 * Cardinality range of a property or association end. `'*'` as the upper
 * bound is stored as {@link UNLIMITED_MAX_MULTIPLICITY}.
 */
export class Multiplicity {
  private _min = 0;
  private _max = 0;

  constructor(min: number, max: MaxMultiplicity) {
    if (!isBound(min)) {
      throw new InvalidValueError(`Invalid min multiplicity: ${String(min)}`, 'min');
    }
    this._min = min;
    this.max = max;
  }

  get min(): number {
    return this._min;
  }

  set min(min: number) {
    if (!isBound(min) || min > this._max) {
      throw new InvalidValueError(`Invalid min multiplicity: ${String(min)}`, 'min');
    }
    this._min = min;
  }

  get max(): number {
    return this._max;
  }

  set max(max: MaxMultiplicity) {
    if (max === '*') {
      this._max = UNLIMITED_MAX_MULTIPLICITY;
      return;
    }
    if (!isBound(max) || max < this._min) {
      throw new InvalidValueError(`Invalid max multiplicity: ${String(max)}`, 'max');
    }
    this._max = max;
  }

  isUnbounded(): boolean {
    return this._max === UNLIMITED_MAX_MULTIPLICITY;
  }

  toString(): string {
    return `${this._min}..${this.isUnbounded() ? '*' : this._max}`;
  }
}
