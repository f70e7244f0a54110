import { Association, AssociationClass, BinaryAssociation } from './lib/association.js';
import { Class } from './lib/class.js';
import type { ClassOptions } from './lib/class.js';
import { Constraint } from './lib/constraint.js';
import type { ConstraintOptions } from './lib/constraint.js';
import { DomainModel, Model } from './lib/domain-model.js';
import type { DomainModelOptions } from './lib/domain-model.js';
import { compareCreationOrder, Element, NamedElement, VISIBILITIES } from './lib/element.js';
import type { ElementOptions, NamedElementOptions, Visibility } from './lib/element.js';
import { Enumeration, EnumerationLiteral } from './lib/enumeration.js';
import type { EnumerationLiteralOptions, EnumerationOptions } from './lib/enumeration.js';
import Errors from './lib/errors.js';
import { Generalization, GeneralizationSet } from './lib/generalization.js';
import type { GeneralizationSetOptions } from './lib/generalization.js';
import { Method, Parameter, VOID_TYPE_NAME } from './lib/method.js';
import type { MethodOptions, ParameterOptions } from './lib/method.js';
import { Multiplicity, UNLIMITED_MAX_MULTIPLICITY } from './lib/multiplicity.js';
import type { MaxMultiplicity } from './lib/multiplicity.js';
import { Package } from './lib/package.js';
import { Property } from './lib/property.js';
import type { PropertyOptions, PropertyOwner } from './lib/property.js';
import type { MetamodelDebugLogger } from './lib/runtime.js';
import { isOwnerReleaseEnabled, setDebugLogger, setOwnerReleaseEnabled } from './lib/runtime.js';
import {
  BooleanType,
  DataType,
  DateTimeType,
  DateType,
  FloatType,
  getPrimitiveType,
  IntegerType,
  PRIMITIVE_TYPE_NAMES,
  PrimitiveDataType,
  primitiveDataTypes,
  resolveType,
  StringType,
  TimeDeltaType,
  TimeType,
  Type,
} from './lib/type.js';
import type { PrimitiveTypeName, TypeOptions, TypeReference } from './lib/type.js';
import { TypedElement } from './lib/typed-element.js';

/**
 * Structural metamodel
 *
 * In-memory object model (classes, attributes, methods, associations,
 * generalizations, enumerations, packages, constraints) that code generators
 * read as their single source of truth.
 */

type CreateDomainModel = ((name: string, options?: DomainModelOptions) => DomainModel) & {
  DomainModel: typeof DomainModel;
  Class: typeof Class;
  Property: typeof Property;
  Method: typeof Method;
  Enumeration: typeof Enumeration;
  BinaryAssociation: typeof BinaryAssociation;
  Generalization: typeof Generalization;
  Errors: typeof Errors;
};

/**
 * Create an empty (or pre-populated) domain model.
 *
 * @param name Name of the model.
 * @param options Initial collections; primitives are always included in `types`.
 * @returns The validated domain model.
 */
const createDomainModel = ((name: string, options?: DomainModelOptions) =>
  new DomainModel(name, options)) as CreateDomainModel;

createDomainModel.DomainModel = DomainModel;
createDomainModel.Class = Class;
createDomainModel.Property = Property;
createDomainModel.Method = Method;
createDomainModel.Enumeration = Enumeration;
createDomainModel.BinaryAssociation = BinaryAssociation;
createDomainModel.Generalization = Generalization;
createDomainModel.Errors = Errors;

export {
  Association,
  AssociationClass,
  BinaryAssociation,
  BooleanType,
  Class,
  compareCreationOrder,
  Constraint,
  createDomainModel,
  DataType,
  DateTimeType,
  DateType,
  DomainModel,
  Element,
  Enumeration,
  EnumerationLiteral,
  Errors,
  FloatType,
  Generalization,
  GeneralizationSet,
  getPrimitiveType,
  IntegerType,
  isOwnerReleaseEnabled,
  Method,
  Model,
  Multiplicity,
  NamedElement,
  Package,
  Parameter,
  PRIMITIVE_TYPE_NAMES,
  PrimitiveDataType,
  primitiveDataTypes,
  Property,
  resolveType,
  setDebugLogger,
  setOwnerReleaseEnabled,
  StringType,
  TimeDeltaType,
  TimeType,
  Type,
  TypedElement,
  UNLIMITED_MAX_MULTIPLICITY,
  VISIBILITIES,
  VOID_TYPE_NAME,
};

export type {
  ClassOptions,
  ConstraintOptions,
  DomainModelOptions,
  ElementOptions,
  EnumerationLiteralOptions,
  EnumerationOptions,
  GeneralizationSetOptions,
  MaxMultiplicity,
  MetamodelDebugLogger,
  MethodOptions,
  NamedElementOptions,
  ParameterOptions,
  PrimitiveTypeName,
  PropertyOptions,
  PropertyOwner,
  TypeOptions,
  TypeReference,
  Visibility,
};

export * from './lib/errors.js';

export default createDomainModel;
