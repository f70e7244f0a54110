import type { Class } from './class.js';
import { NamedElement } from './element.js';
import type { TypeOptions } from './type.js';

export interface ConstraintOptions extends TypeOptions {
  language?: string;
}

export class Constraint extends NamedElement {
  context: Class;
  expression: string;
  language: string;

  constructor(name: string, context: Class, expression: string, options: ConstraintOptions = {}) {
    super(name, options);
    this.context = context;
    this.expression = expression;
    this.language = options.language ?? 'OCL';
  }
}
