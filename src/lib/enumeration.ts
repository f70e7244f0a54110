import { NamedElement, type NamedElementOptions } from './element.js';
import { InvalidOwnerError } from './errors.js';
import { assertNameAvailable, assertUniqueNames } from './name-index.js';
import { isOwnerReleaseEnabled } from './runtime.js';
import { DataType, PrimitiveDataType, type TypeOptions } from './type.js';

export interface EnumerationLiteralOptions extends NamedElementOptions {
  owner?: DataType | null;
}

export class EnumerationLiteral extends NamedElement {
  private _owner: DataType | null = null;

  constructor(name: string, options: EnumerationLiteralOptions = {}) {
    super(name, options);
    this.owner = options.owner ?? null;
  }

  get owner(): DataType | null {
    return this._owner;
  }

  set owner(owner: DataType | null) {
    if (owner instanceof PrimitiveDataType) {
      throw new InvalidOwnerError(
        `Enumeration literal '${this.name}' cannot be owned by primitive type '${owner.name}'`
      );
    }
    this._owner = owner;
  }
}

export interface EnumerationOptions extends TypeOptions {
  literals?: Iterable<EnumerationLiteral>;
}

export class Enumeration extends DataType {
  private _literals: Set<EnumerationLiteral> = new Set();

  constructor(name: string, options: EnumerationOptions = {}) {
    super(name, options);
    this.literals = options.literals ?? [];
  }

  get literals(): ReadonlySet<EnumerationLiteral> {
    return this._literals;
  }

  /**
   * Replace every literal. Owners are repointed at this enumeration once the
   * whole candidate set has been validated.
   */
  set literals(literals: Iterable<EnumerationLiteral>) {
    const candidate = new Set(literals);
    assertUniqueNames(candidate, 'An enumeration', 'literals');
    if (isOwnerReleaseEnabled()) {
      for (const literal of this._literals) {
        if (!candidate.has(literal) && literal.owner === this) {
          literal.owner = null;
        }
      }
    }
    for (const literal of candidate) {
      literal.owner = this;
    }
    this._literals = candidate;
  }

  addLiteral(literal: EnumerationLiteral): void {
    assertNameAvailable(this._literals, literal, 'An enumeration', 'literal');
    literal.owner = this;
    this._literals.add(literal);
  }

  getLiteralByName(name: string): EnumerationLiteral | null {
    for (const literal of this._literals) {
      if (literal.name === name) return literal;
    }
    return null;
  }
}
