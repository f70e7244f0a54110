import type { NamedElementOptions } from './element.js';
import { InvalidOwnerError } from './errors.js';
import { assertNameAvailable, assertUniqueNames } from './name-index.js';
import { DataType, type Type, type TypeReference } from './type.js';
import { TypedElement } from './typed-element.js';

export interface ParameterOptions extends NamedElementOptions {
  defaultValue?: unknown;
}

export class Parameter extends TypedElement {
  defaultValue: unknown;

  constructor(name: string, type: TypeReference, options: ParameterOptions = {}) {
    super(name, type, options);
    this.defaultValue = options.defaultValue;
  }
}

export interface MethodOptions extends NamedElementOptions {
  type?: TypeReference;
  parameters?: Iterable<Parameter>;
  owner?: Type | null;
  isAbstract?: boolean;
  code?: string;
}

/** Result type given to methods declared without one. */
export const VOID_TYPE_NAME = 'OclVoid';

/**
 * A class operation. Parameter names are unique within the method.
 */
export class Method extends TypedElement {
  private _owner: Type | null = null;
  private _parameters: Set<Parameter> = new Set();
  isAbstract: boolean;
  code: string;

  constructor(name: string, options: MethodOptions = {}) {
    super(name, options.type ?? VOID_TYPE_NAME, options);
    this.isAbstract = options.isAbstract ?? false;
    this.parameters = options.parameters ?? [];
    this.owner = options.owner ?? null;
    this.code = options.code ?? '';
  }

  get parameters(): ReadonlySet<Parameter> {
    return this._parameters;
  }

  set parameters(parameters: Iterable<Parameter>) {
    const candidate = new Set(parameters);
    assertUniqueNames(candidate, 'A method', 'parameters');
    this._parameters = candidate;
  }

  addParameter(parameter: Parameter): void {
    assertNameAvailable(this._parameters, parameter, 'A method', 'parameter');
    this._parameters.add(parameter);
  }

  getParameterByName(name: string): Parameter | null {
    for (const parameter of this._parameters) {
      if (parameter.name === name) return parameter;
    }
    return null;
  }

  get owner(): Type | null {
    return this._owner;
  }

  set owner(owner: Type | null) {
    if (owner instanceof DataType) {
      throw new InvalidOwnerError(`Method '${this.name}' cannot be owned by data type '${owner.name}'`);
    }
    this._owner = owner;
  }
}
