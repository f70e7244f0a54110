import type { Association } from './association.js';
import { CyclicGeneralizationError, MultipleIdentifiersError } from './errors.js';
import type { Generalization } from './generalization.js';
import type { Method } from './method.js';
import { assertNameAvailable, assertUniqueNames } from './name-index.js';
import type { Property } from './property.js';
import { isOwnerReleaseEnabled } from './runtime.js';
import { Type, type TypeOptions } from './type.js';

export interface ClassOptions extends TypeOptions {
  attributes?: Iterable<Property>;
  methods?: Iterable<Method>;
  isAbstract?: boolean;
  isReadOnly?: boolean;
}

/**
 * Walk `next` transitively from `start`, failing when a class reachable from
 * itself shows up on the current path. Classes reached twice through
 * different routes are expanded only once.
 */
function collectClosure(start: Class, next: (cls: Class) => Set<Class>): Set<Class> {
  const result = new Set<Class>();
  const path: Class[] = [start];

  const visit = (cls: Class): void => {
    for (const related of next(cls)) {
      const onPath = path.indexOf(related);
      if (onPath !== -1) {
        throw new CyclicGeneralizationError(
          [...path.slice(onPath), related].map(member => member.name)
        );
      }
      if (result.has(related)) continue;
      result.add(related);
      path.push(related);
      visit(related);
      path.pop();
    }
  };

  visit(start);
  return result;
}

const countIdentifiers = (attributes: Iterable<Property>): number => {
  let count = 0;
  for (const attribute of attributes) {
    if (attribute.isId) count += 1;
  }
  return count;
};

/**
 * Central vertex of the type graph. A class owns its attributes and methods;
 * `associations` and `generalizations` are back-references kept up to date by
 * {@link Association} and {@link Generalization} and are never edited here.
 */
export class Class extends Type {
  private _attributes: Set<Property> = new Set();
  private _methods: Set<Method> = new Set();
  private readonly _associations: Set<Association> = new Set();
  private readonly _generalizations: Set<Generalization> = new Set();
  isAbstract: boolean;
  isReadOnly: boolean;

  constructor(name: string, options: ClassOptions = {}) {
    super(name, options);
    this.isAbstract = options.isAbstract ?? false;
    this.isReadOnly = options.isReadOnly ?? false;
    this.attributes = options.attributes ?? [];
    this.methods = options.methods ?? [];
  }

  get attributes(): ReadonlySet<Property> {
    return this._attributes;
  }

  /**
   * Replace every attribute. The candidate set is checked for duplicate names
   * and for more than one identifier before anything changes.
   */
  set attributes(attributes: Iterable<Property>) {
    const candidate = new Set(attributes);
    assertUniqueNames(candidate, 'A class', 'attributes');
    if (countIdentifiers(candidate) > 1) {
      throw new MultipleIdentifiersError(this.name);
    }
    if (isOwnerReleaseEnabled()) {
      for (const attribute of this._attributes) {
        if (!candidate.has(attribute) && attribute.owner === this) {
          attribute.owner = null;
        }
      }
    }
    for (const attribute of candidate) {
      attribute.owner = this;
    }
    this._attributes = candidate;
  }

  get methods(): ReadonlySet<Method> {
    return this._methods;
  }

  set methods(methods: Iterable<Method>) {
    const candidate = new Set(methods);
    assertUniqueNames(candidate, 'A class', 'methods');
    if (isOwnerReleaseEnabled()) {
      for (const method of this._methods) {
        if (!candidate.has(method) && method.owner === this) {
          method.owner = null;
        }
      }
    }
    for (const method of candidate) {
      method.owner = this;
    }
    this._methods = candidate;
  }

  addAttribute(attribute: Property): void {
    assertNameAvailable(this._attributes, attribute, 'A class', 'attribute');
    if (attribute.isId && !this._attributes.has(attribute) && this.idAttribute() !== null) {
      throw new MultipleIdentifiersError(this.name);
    }
    attribute.owner = this;
    this._attributes.add(attribute);
  }

  addMethod(method: Method): void {
    assertNameAvailable(this._methods, method, 'A class', 'method');
    method.owner = this;
    this._methods.add(method);
  }

  getAttributeByName(name: string): Property | null {
    for (const attribute of this._attributes) {
      if (attribute.name === name) return attribute;
    }
    return null;
  }

  getMethodByName(name: string): Method | null {
    for (const method of this._methods) {
      if (method.name === name) return method;
    }
    return null;
  }

  /**
   * The attribute marked as identifier, if any.
   */
  idAttribute(): Property | null {
    for (const attribute of this._attributes) {
      if (attribute.isId) return attribute;
    }
    return null;
  }

  get associations(): ReadonlySet<Association> {
    return this._associations;
  }

  get generalizations(): ReadonlySet<Generalization> {
    return this._generalizations;
  }

  /** @internal */
  registerAssociation(association: Association): void {
    this._associations.add(association);
  }

  /** @internal */
  unregisterAssociation(association: Association): void {
    this._associations.delete(association);
  }

  /** @internal */
  registerGeneralization(generalization: Generalization): void {
    this._generalizations.add(generalization);
  }

  /** @internal */
  unregisterGeneralization(generalization: Generalization): void {
    this._generalizations.delete(generalization);
  }

  /**
   * Direct superclasses.
   */
  parents(): Set<Class> {
    const parents = new Set<Class>();
    for (const generalization of this._generalizations) {
      if (generalization.general !== this) {
        parents.add(generalization.general);
      }
    }
    return parents;
  }

  /**
   * Every transitive superclass.
   * @throws CyclicGeneralizationError when the ancestors form a cycle.
   */
  allParents(): Set<Class> {
    return collectClosure(this, cls => cls.parents());
  }

  /**
   * Direct subclasses.
   */
  specializations(): Set<Class> {
    const specializations = new Set<Class>();
    for (const generalization of this._generalizations) {
      if (generalization.specific !== this) {
        specializations.add(generalization.specific);
      }
    }
    return specializations;
  }

  /**
   * Every transitive subclass.
   * @throws CyclicGeneralizationError when the descendants form a cycle.
   */
  allSpecializations(): Set<Class> {
    return collectClosure(this, cls => cls.specializations());
  }

  inheritedAttributes(): Set<Property> {
    const inherited = new Set<Property>();
    for (const parent of this.allParents()) {
      for (const attribute of parent.attributes) {
        inherited.add(attribute);
      }
    }
    return inherited;
  }

  /**
   * Own attributes followed by every inherited one. Same-named attributes of
   * different classes are all kept.
   */
  allAttributes(): Set<Property> {
    return new Set([...this._attributes, ...this.inheritedAttributes()]);
  }

  /**
   * Ends of the associations this class takes part in that point away from
   * it. For a two-ended association whose ends share one type (a reflexive
   * association) both ends are returned.
   */
  associationEnds(): Set<Property> {
    const ends = new Set<Property>();
    for (const association of this._associations) {
      const associationEnds = [...association.ends];
      const [first, second] = associationEnds;
      const reflexive =
        associationEnds.length === 2 &&
        first !== undefined &&
        second !== undefined &&
        first.type === second.type;
      for (const end of associationEnds) {
        if (reflexive || end.type !== this) {
          ends.add(end);
        }
      }
    }
    return ends;
  }

  /**
   * Association ends of this class and of all its superclasses.
   */
  allAssociationEnds(): Set<Property> {
    const ends = this.associationEnds();
    for (const parent of this.allParents()) {
      for (const end of parent.associationEnds()) {
        ends.add(end);
      }
    }
    return ends;
  }
}
