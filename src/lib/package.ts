import type { Class } from './class.js';
import { NamedElement } from './element.js';
import type { TypeOptions } from './type.js';

/**
 * Named grouping of classes. Membership does not imply ownership: a class
 * may appear in several packages.
 */
export class Package extends NamedElement {
  classes: Set<Class>;

  constructor(name: string, classes: Iterable<Class> = [], options: TypeOptions = {}) {
    super(name, options);
    this.classes = new Set(classes);
  }

  addClass(cls: Class): void {
    this.classes.add(cls);
  }
}
