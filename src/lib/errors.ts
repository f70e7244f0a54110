/**
 * Error classes for the structural metamodel
 *
 * Every validation failure raised while building or rewiring a model is one of
 * these. They are all input errors: the caller fixes the data and retries.
 */

/**
 * Base metamodel error class
 */
export class MetamodelError extends Error {
  code: string | null;

  constructor(message: string, code: string | null = null) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Invalid value error - bad visibility, multiplicity bound, name or end type
 */
export class InvalidValueError extends MetamodelError {
  field: string | null;

  constructor(message: string, field: string | null = null, code = 'INVALID_VALUE') {
    super(message, code);
    this.field = field;
  }
}

/**
 * Primitive data type constructed with a name outside the fixed registry
 */
export class InvalidPrimitiveTypeError extends InvalidValueError {
  typeName: string;

  constructor(typeName: string) {
    super(`Invalid primitive data type: '${typeName}'`, 'name', 'INVALID_PRIMITIVE_TYPE');
    this.name = 'InvalidPrimitiveTypeError';
    this.typeName = typeName;
  }
}

/**
 * Two elements of the same kind share a name within one collection
 */
export class DuplicateNameError extends MetamodelError {
  names: string[];
  collection: string;

  constructor(message: string, names: string[], collection: string) {
    super(message, 'DUPLICATE_NAME');
    this.name = 'DuplicateNameError';
    this.names = names;
    this.collection = collection;
  }
}

/**
 * More than one attribute of a class is marked as identifier
 */
export class MultipleIdentifiersError extends MetamodelError {
  className: string;

  constructor(className: string) {
    super(
      `A class cannot have more than one attribute marked as 'id' (class '${className}')`,
      'MULTIPLE_IDENTIFIERS'
    );
    this.name = 'MultipleIdentifiersError';
    this.className = className;
  }
}

/**
 * An element was assigned an owner of a kind that cannot own it
 */
export class InvalidOwnerError extends MetamodelError {
  constructor(message = 'Invalid owner') {
    super(message, 'INVALID_OWNER');
    this.name = 'InvalidOwnerError';
  }
}

/**
 * A generalization whose general and specific are the same class
 */
export class SelfGeneralizationError extends MetamodelError {
  constructor(className: string) {
    super(`A class cannot be a generalization of itself: '${className}'`, 'SELF_GENERALIZATION');
    this.name = 'SelfGeneralizationError';
  }
}

/**
 * Association end count or composition rule violated
 */
export class ArityViolationError extends MetamodelError {
  constructor(message: string) {
    super(message, 'ARITY_VIOLATION');
    this.name = 'ArityViolationError';
  }
}

/**
 * Generalization edges form a cycle
 */
export class CyclicGeneralizationError extends MetamodelError {
  cycle: string[];

  constructor(cycle: string[]) {
    super(`Generalization cycle detected: ${cycle.join(' -> ')}`, 'CYCLIC_GENERALIZATION');
    this.name = 'CyclicGeneralizationError';
    this.cycle = cycle;
  }
}

/**
 * Invalid UUID error - for malformed element identifiers
 */
export class InvalidUUIDError extends MetamodelError {
  constructor(message = 'Invalid UUID format') {
    super(message, 'INVALID_UUID');
    this.name = 'InvalidUUIDError';
  }
}

const errors = {
  MetamodelError,
  InvalidValueError,
  InvalidPrimitiveTypeError,
  DuplicateNameError,
  MultipleIdentifiersError,
  InvalidOwnerError,
  SelfGeneralizationError,
  ArityViolationError,
  CyclicGeneralizationError,
  InvalidUUIDError,
} as const;

export default errors;
