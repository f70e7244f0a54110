import isUUID from 'is-uuid';

import type { Association } from './association.js';
import { Class } from './class.js';
import type { Constraint } from './constraint.js';
import { compareCreationOrder, type Element, NamedElement } from './element.js';
import { Enumeration } from './enumeration.js';
import { CyclicGeneralizationError, InvalidUUIDError } from './errors.js';
import type { Generalization } from './generalization.js';
import { assertUniqueNames } from './name-index.js';
import type { Package } from './package.js';
import { debug } from './runtime.js';
import { primitiveDataTypes, type Type, type TypeOptions } from './type.js';

/**
 * Root of every kind of model.
 */
export abstract class Model extends NamedElement {}

export interface DomainModelOptions extends TypeOptions {
  types?: Iterable<Type>;
  associations?: Iterable<Association>;
  generalizations?: Iterable<Generalization>;
  packages?: Iterable<Package>;
  constraints?: Iterable<Constraint>;
}

/**
 * Root aggregate of a structural model. Each collection setter validates the
 * whole candidate collection and only then replaces the stored one, so a
 * rejected assignment leaves the model as it was.
 */
export class DomainModel extends Model {
  private _types: Set<Type> = new Set(primitiveDataTypes);
  private _associations: Set<Association> = new Set();
  private _generalizations: Set<Generalization> = new Set();
  private _packages: Set<Package> = new Set();
  private _constraints: Set<Constraint> = new Set();

  constructor(name: string, options: DomainModelOptions = {}) {
    super(name, options);
    this.types = options.types ?? [];
    this.packages = options.packages ?? [];
    this.constraints = options.constraints ?? [];
    this.associations = options.associations ?? [];
    this.generalizations = options.generalizations ?? [];
  }

  get types(): ReadonlySet<Type> {
    return this._types;
  }

  /**
   * Replace the model's types. The primitive registry is always merged in.
   */
  set types(types: Iterable<Type>) {
    const candidate = new Set<Type>(types);
    for (const primitive of primitiveDataTypes) {
      candidate.add(primitive);
    }
    assertUniqueNames(candidate, 'The model', 'types');
    this._types = candidate;
    debug.model(`Model '${this.name}' holds ${candidate.size} types`);
  }

  addType(type: Type): void {
    this.types = [...this._types, type];
  }

  get associations(): ReadonlySet<Association> {
    return this._associations;
  }

  set associations(associations: Iterable<Association>) {
    const candidate = new Set(associations);
    assertUniqueNames(candidate, 'The model', 'associations');
    this._associations = candidate;
    debug.model(`Model '${this.name}' holds ${candidate.size} associations`);
  }

  addAssociation(association: Association): void {
    this.associations = [...this._associations, association];
  }

  get generalizations(): ReadonlySet<Generalization> {
    return this._generalizations;
  }

  set generalizations(generalizations: Iterable<Generalization>) {
    this._generalizations = new Set(generalizations);
  }

  addGeneralization(generalization: Generalization): void {
    this.generalizations = [...this._generalizations, generalization];
  }

  get packages(): ReadonlySet<Package> {
    return this._packages;
  }

  set packages(packages: Iterable<Package>) {
    const candidate = new Set(packages);
    assertUniqueNames(candidate, 'The model', 'packages');
    this._packages = candidate;
  }

  addPackage(pkg: Package): void {
    this.packages = [...this._packages, pkg];
  }

  get constraints(): ReadonlySet<Constraint> {
    return this._constraints;
  }

  set constraints(constraints: Iterable<Constraint>) {
    const candidate = new Set(constraints);
    assertUniqueNames(candidate, 'The model', 'constraints');
    this._constraints = candidate;
  }

  addConstraint(constraint: Constraint): void {
    this.constraints = [...this._constraints, constraint];
  }

  /**
   * Find a type (primitives included) by name.
   * @param name Type name to look up.
   * @returns The type, or null when none has that name.
   */
  getTypeByName(name: string): Type | null {
    for (const type of this._types) {
      if (type.name === name) return type;
    }
    return null;
  }

  getClassByName(name: string): Class | null {
    for (const type of this._types) {
      if (type instanceof Class && type.name === name) return type;
    }
    return null;
  }

  getAssociationByName(name: string): Association | null {
    for (const association of this._associations) {
      if (association.name === name) return association;
    }
    return null;
  }

  getClasses(): Set<Class> {
    const classes = new Set<Class>();
    for (const type of this._types) {
      if (type instanceof Class) classes.add(type);
    }
    return classes;
  }

  getEnumerations(): Set<Enumeration> {
    const enumerations = new Set<Enumeration>();
    for (const type of this._types) {
      if (type instanceof Enumeration) enumerations.add(type);
    }
    return enumerations;
  }

  /**
   * Order every class of the model so that each class comes after all of its
   * ancestors. Classes are explored in creation order, so the result is
   * stable for a given model.
   * @returns Classes, parents before children.
   * @throws CyclicGeneralizationError when generalizations form a cycle.
   */
  classesSortedByInheritance(): Class[] {
    const classes = [...this.getClasses()].sort(compareCreationOrder);
    const children = new Map<Class, Class[]>(classes.map(cls => [cls, []]));

    for (const cls of classes) {
      for (const generalization of cls.generalizations) {
        if (generalization.specific === cls) {
          children.get(generalization.general)?.push(cls);
        }
      }
    }

    const visited = new Set<Class>();
    const path: Class[] = [];
    const sorted: Class[] = [];

    const visit = (cls: Class): void => {
      visited.add(cls);
      path.push(cls);
      for (const child of children.get(cls) ?? []) {
        const onPath = path.indexOf(child);
        if (onPath !== -1) {
          const cycle = [...path.slice(onPath), child].map(member => member.name);
          debug.error(`Model '${this.name}' has a generalization cycle: ${cycle.join(' -> ')}`);
          throw new CyclicGeneralizationError(cycle);
        }
        if (!visited.has(child)) {
          visit(child);
        }
      }
      path.pop();
      sorted.push(cls);
    };

    for (const cls of classes) {
      if (!visited.has(cls)) {
        visit(cls);
      }
    }

    sorted.reverse();
    debug.model(`Model '${this.name}' inheritance order: ${sorted.map(cls => cls.name).join(', ')}`);
    return sorted;
  }

  /**
   * Every element reachable from the model: the model itself, its types and
   * their members, associations and their ends, generalizations, packages
   * and constraints.
   */
  *elements(): Generator<Element> {
    yield this;
    for (const type of this._types) {
      yield type;
      if (type instanceof Class) {
        yield* type.attributes;
        for (const method of type.methods) {
          yield method;
          yield* method.parameters;
        }
      } else if (type instanceof Enumeration) {
        yield* type.literals;
      }
    }
    for (const association of this._associations) {
      yield association;
      yield* association.ends;
    }
    yield* this._generalizations;
    yield* this._packages;
    yield* this._constraints;
  }

  /**
   * Look up any element of the model by its identifier.
   * @param id UUID assigned to the element at construction.
   * @returns The element, or null when it is not part of this model.
   * @throws InvalidUUIDError when `id` is not a v4 UUID.
   */
  getElementById(id: string): Element | null {
    if (!isUUID.v4(id)) {
      throw new InvalidUUIDError(`Invalid element id: '${id}'`);
    }
    for (const element of this.elements()) {
      if (element.id === id) return element;
    }
    return null;
  }
}
