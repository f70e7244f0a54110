import { Class, type ClassOptions } from './class.js';
import { NamedElement, type NamedElementOptions } from './element.js';
import { ArityViolationError, InvalidValueError } from './errors.js';
import type { Property } from './property.js';
import { debug } from './runtime.js';

export type AssociationOptions = Omit<NamedElementOptions, 'visibility'>;

const endClass = (end: Property): Class => {
  if (!(end.type instanceof Class)) {
    throw new InvalidValueError(
      `Association end '${end.name}' must be typed by a class, got '${end.type.name}'`,
      'ends'
    );
  }
  return end.type;
};

/**
 * Relationship between two or more classes. Assigning `ends` keeps every
 * involved class's `associations` back-reference set in sync.
 */
export class Association extends NamedElement {
  private _ends: Set<Property> = new Set();

  constructor(name: string, ends: Iterable<Property>, options: AssociationOptions = {}) {
    super(name, options);
    this.ends = ends;
  }

  get ends(): ReadonlySet<Property> {
    return this._ends;
  }

  set ends(ends: Iterable<Property>) {
    const candidate = new Set(ends);
    this.validateEnds(candidate);
    const classes = [...candidate].map(endClass);

    for (const end of this._ends) {
      if (end.type instanceof Class) {
        end.type.unregisterAssociation(this);
      }
    }
    for (const end of candidate) {
      end.owner = this;
    }
    for (const cls of classes) {
      cls.registerAssociation(this);
    }
    this._ends = candidate;

    debug.model(
      `Association '${this.name}' linked to ${classes.map(cls => `'${cls.name}'`).join(', ')}`
    );
  }

  /**
   * Arity rules checked before any back-reference is touched.
   */
  protected validateEnds(ends: ReadonlySet<Property>): void {
    if (ends.size <= 1) {
      throw new ArityViolationError(
        `An association must have more than one end (association '${this.name}')`
      );
    }
  }
}

/**
 * Association with exactly two ends, at most one of them composite.
 */
export class BinaryAssociation extends Association {
  protected override validateEnds(ends: ReadonlySet<Property>): void {
    if (ends.size !== 2) {
      throw new ArityViolationError(
        `A binary association must have exactly two ends (association '${this.name}')`
      );
    }
    if ([...ends].every(end => end.isComposite)) {
      throw new ArityViolationError(
        `The composition attribute cannot be tagged at both ends (association '${this.name}')`
      );
    }
  }

  /**
   * The end opposite to `end`, or null when `end` does not belong here.
   */
  otherEnd(end: Property): Property | null {
    if (!this.ends.has(end)) return null;
    for (const candidate of this.ends) {
      if (candidate !== end) return candidate;
    }
    return null;
  }
}

/**
 * A class that also describes an association, carrying attributes of the
 * link itself.
 */
export class AssociationClass extends Class {
  association: Association;

  constructor(
    name: string,
    attributes: Iterable<Property>,
    association: Association,
    options: Omit<ClassOptions, 'attributes'> = {}
  ) {
    super(name, { ...options, attributes });
    this.association = association;
  }
}
