import type { Class } from './class.js';
import { Element, type ElementOptions, NamedElement } from './element.js';
import { SelfGeneralizationError } from './errors.js';
import { debug } from './runtime.js';
import type { TypeOptions } from './type.js';

/**
 * Directed edge from a specific class to its general class. Each side is
 * rewired independently: the old class loses its back-reference before the
 * new one gains it.
 */
export class Generalization extends Element {
  private _general: Class;
  private _specific: Class;

  constructor(general: Class, specific: Class, options: ElementOptions = {}) {
    super(options);
    if (general === specific) {
      throw new SelfGeneralizationError(specific.name);
    }
    this._general = general;
    this._specific = specific;
    general.registerGeneralization(this);
    specific.registerGeneralization(this);
  }

  get general(): Class {
    return this._general;
  }

  set general(general: Class) {
    if (general === this._specific) {
      throw new SelfGeneralizationError(general.name);
    }
    this._general.unregisterGeneralization(this);
    general.registerGeneralization(this);
    this._general = general;
    debug.model(`Generalization general set to '${general.name}'`);
  }

  get specific(): Class {
    return this._specific;
  }

  set specific(specific: Class) {
    if (specific === this._general) {
      throw new SelfGeneralizationError(specific.name);
    }
    this._specific.unregisterGeneralization(this);
    specific.registerGeneralization(this);
    this._specific = specific;
    debug.model(`Generalization specific set to '${specific.name}'`);
  }
}

export interface GeneralizationSetOptions extends TypeOptions {
  isDisjoint: boolean;
  isComplete: boolean;
}

/**
 * Named group of generalizations sharing a general class, with the usual
 * disjoint/complete flags.
 */
export class GeneralizationSet extends NamedElement {
  generalizations: Set<Generalization>;
  isDisjoint: boolean;
  isComplete: boolean;

  constructor(
    name: string,
    generalizations: Iterable<Generalization>,
    options: GeneralizationSetOptions
  ) {
    super(name, options);
    this.generalizations = new Set(generalizations);
    this.isDisjoint = options.isDisjoint;
    this.isComplete = options.isComplete;
  }
}
