import { NamedElement, type NamedElementOptions } from './element.js';
import { resolveType, type Type, type TypeReference } from './type.js';

/**
 * A named element with a type. String references are resolved once, at
 * construction, against the primitive registry.
 */
export abstract class TypedElement extends NamedElement {
  type: Type;

  constructor(name: string, type: TypeReference, options: NamedElementOptions = {}) {
    super(name, options);
    this.type = resolveType(type);
  }
}
