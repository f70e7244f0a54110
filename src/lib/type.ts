import { NamedElement, type NamedElementOptions } from './element.js';
import { InvalidPrimitiveTypeError } from './errors.js';

export type TypeOptions = Omit<NamedElementOptions, 'visibility'>;

/**
 * Anything that can type a property, parameter or method result.
 */
export class Type extends NamedElement {
  constructor(name: string, options: TypeOptions = {}) {
    super(name, options);
  }

  toString(): string {
    return `${this.constructor.name}(${this.name})`;
  }
}

/**
 * A type whose instances are identified only by their value.
 */
export class DataType extends Type {}

export const PRIMITIVE_TYPE_NAMES = [
  'int',
  'float',
  'str',
  'bool',
  'time',
  'date',
  'datetime',
  'timedelta',
] as const;

export type PrimitiveTypeName = (typeof PRIMITIVE_TYPE_NAMES)[number];

const isPrimitiveTypeName = (name: string): name is PrimitiveTypeName =>
  (PRIMITIVE_TYPE_NAMES as readonly string[]).includes(name);

/**
 * Built-in scalar type. Only the names in {@link PRIMITIVE_TYPE_NAMES} are
 * accepted; the shared instances below are the ones models should reference.
 */
export class PrimitiveDataType extends DataType {
  protected override assignName(name: string): void {
    if (!isPrimitiveTypeName(name)) {
      throw new InvalidPrimitiveTypeError(name);
    }
    super.assignName(name);
  }
}

export const StringType = new PrimitiveDataType('str');
export const IntegerType = new PrimitiveDataType('int');
export const FloatType = new PrimitiveDataType('float');
export const BooleanType = new PrimitiveDataType('bool');
export const TimeType = new PrimitiveDataType('time');
export const DateType = new PrimitiveDataType('date');
export const DateTimeType = new PrimitiveDataType('datetime');
export const TimeDeltaType = new PrimitiveDataType('timedelta');

export const primitiveDataTypes: ReadonlySet<PrimitiveDataType> = new Set([
  StringType,
  IntegerType,
  FloatType,
  BooleanType,
  TimeType,
  DateType,
  DateTimeType,
  TimeDeltaType,
]);

const TYPE_ALIASES: ReadonlyMap<string, PrimitiveDataType> = new Map([
  ['str', StringType],
  ['string', StringType],
  ['int', IntegerType],
  ['float', FloatType],
  ['bool', BooleanType],
  ['time', TimeType],
  ['date', DateType],
  ['datetime', DateTimeType],
  ['timedelta', TimeDeltaType],
]);

/**
 * A type given either as a resolved {@link Type} or by name.
 */
export type TypeReference = Type | string;

/**
 * Look up the shared primitive registered under a name or alias.
 * @param name Primitive name or alias such as `string`.
 * @returns The shared primitive, or null when the name is not registered.
 */
export function getPrimitiveType(name: string): PrimitiveDataType | null {
  return TYPE_ALIASES.get(name) ?? null;
}

/**
 * Resolve a type reference. Names matching a primitive map to the shared
 * instance; any other name yields a new, unregistered {@link Type}.
 */
export function resolveType(reference: TypeReference): Type {
  if (reference instanceof Type) {
    return reference;
  }
  return getPrimitiveType(reference) ?? new Type(reference);
}
