import type { Association } from './association.js';
import type { NamedElementOptions } from './element.js';
import { InvalidOwnerError } from './errors.js';
import { Multiplicity } from './multiplicity.js';
import { DataType, type Type, type TypeReference } from './type.js';
import { TypedElement } from './typed-element.js';

export type PropertyOwner = Type | Association;

export interface PropertyOptions extends NamedElementOptions {
  owner?: PropertyOwner | null;
  multiplicity?: Multiplicity;
  isComposite?: boolean;
  isNavigable?: boolean;
  isId?: boolean;
  isReadOnly?: boolean;
}

/**
 * An attribute of a class or an end of an association.
 */
export class Property extends TypedElement {
  private _owner: PropertyOwner | null = null;
  multiplicity: Multiplicity;
  isComposite: boolean;
  isNavigable: boolean;
  isId: boolean;
  isReadOnly: boolean;

  constructor(name: string, type: TypeReference, options: PropertyOptions = {}) {
    super(name, type, options);
    this.owner = options.owner ?? null;
    this.multiplicity = options.multiplicity ?? new Multiplicity(1, 1);
    this.isComposite = options.isComposite ?? false;
    this.isNavigable = options.isNavigable ?? true;
    this.isId = options.isId ?? false;
    this.isReadOnly = options.isReadOnly ?? false;
  }

  get owner(): PropertyOwner | null {
    return this._owner;
  }

  set owner(owner: PropertyOwner | null) {
    if (owner instanceof DataType) {
      throw new InvalidOwnerError(
        `Property '${this.name}' cannot be owned by data type '${owner.name}'`
      );
    }
    this._owner = owner;
  }
}
