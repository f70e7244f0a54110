import { randomUUID } from 'node:crypto';

import { InvalidValueError } from './errors.js';

export const VISIBILITIES = ['public', 'private', 'protected', 'package'] as const;

export type Visibility = (typeof VISIBILITIES)[number];

export interface ElementOptions {
  timestamp?: Date;
}

export interface NamedElementOptions extends ElementOptions {
  synonyms?: string[] | null;
  visibility?: Visibility;
}

let creationCounter = 0;

const isVisibility = (value: unknown): value is Visibility =>
  typeof value === 'string' && (VISIBILITIES as readonly string[]).includes(value);

/**
 * Root of every structural element. Each element receives a random v4 UUID
 * and a creation-order marker that increases strictly across the process, so
 * sorting by it reproduces construction order even inside one clock tick.
 */
export abstract class Element {
  readonly id: string;
  readonly creationOrder: number;
  timestamp: Date;

  constructor(options: ElementOptions = {}) {
    this.id = randomUUID();
    creationCounter += 1;
    this.creationOrder = creationCounter;
    this.timestamp = options.timestamp ?? new Date();
  }
}

/**
 * Superclass of all structural elements with a name.
 */
export abstract class NamedElement extends Element {
  private _name = '';
  private _visibility: Visibility = 'public';
  synonyms: string[] | null;

  constructor(name: string, options: NamedElementOptions = {}) {
    super(options);
    this.name = name;
    this.synonyms = options.synonyms ?? null;
    this.visibility = options.visibility ?? 'public';
  }

  get name(): string {
    return this._name;
  }

  set name(name: string) {
    this.assignName(name);
  }

  /**
   * Hook for subclasses that restrict the set of acceptable names.
   */
  protected assignName(name: string): void {
    if (typeof name !== 'string') {
      throw new InvalidValueError('Element name must be a string', 'name');
    }
    this._name = name;
  }

  get visibility(): Visibility {
    return this._visibility;
  }

  set visibility(visibility: Visibility) {
    if (!isVisibility(visibility)) {
      throw new InvalidValueError(
        `Invalid value of visibility: '${String(visibility)}'. Must be one of: ${VISIBILITIES.join(', ')}`,
        'visibility'
      );
    }
    this._visibility = visibility;
  }
}

/**
 * Order two elements by construction order.
 */
export const compareCreationOrder = (a: Element, b: Element): number =>
  a.creationOrder - b.creationOrder;
