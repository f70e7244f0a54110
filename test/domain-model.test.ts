import assert from 'node:assert/strict';
import { randomUUID } from 'node:crypto';
import test from 'node:test';

import createDomainModel from '../src/index.js';
import { BinaryAssociation } from '../src/lib/association.js';
import { Class } from '../src/lib/class.js';
import { Constraint } from '../src/lib/constraint.js';
import { DomainModel } from '../src/lib/domain-model.js';
import { Enumeration, EnumerationLiteral } from '../src/lib/enumeration.js';
import {
  CyclicGeneralizationError,
  DuplicateNameError,
  InvalidUUIDError,
} from '../src/lib/errors.js';
import { Generalization } from '../src/lib/generalization.js';
import { Method, Parameter } from '../src/lib/method.js';
import { Multiplicity } from '../src/lib/multiplicity.js';
import { Package } from '../src/lib/package.js';
import { Property } from '../src/lib/property.js';
import { DataType, IntegerType, primitiveDataTypes, StringType } from '../src/lib/type.js';

const buildLibraryModel = () => {
  const title = new Property('title', 'str');
  const isbn = new Property('isbn', 'str', { isId: true });
  const lend = new Method('lend', { parameters: [new Parameter('days', 'int')] });
  const book = new Class('Book', { attributes: [isbn, title], methods: [lend] });
  const author = new Class('Author', { attributes: [new Property('name', 'str')] });
  const hardcover = new EnumerationLiteral('Hardcover');
  const format = new Enumeration('Format', { literals: [hardcover] });
  const writtenBy = new Property('writtenBy', author, { multiplicity: new Multiplicity(1, '*') });
  const publishes = new Property('publishes', book, { multiplicity: new Multiplicity(0, '*') });
  const writes = new BinaryAssociation('Writes', [writtenBy, publishes]);
  const model = new DomainModel('Library', {
    types: [book, author, format],
    associations: [writes],
  });
  return { model, book, author, format, hardcover, title, lend, writes, writtenBy };
};

test('DomainModel always contains the primitive types', () => {
  const empty = new DomainModel('Empty');
  const { model } = buildLibraryModel();

  assert.strictEqual(empty.types.size, primitiveDataTypes.size);
  assert.strictEqual(empty.getTypeByName('int'), IntegerType);
  assert.strictEqual(model.types.size, primitiveDataTypes.size + 3);
  assert.strictEqual(model.getTypeByName('str'), StringType);
});

test('DomainModel rejects two classes named alike at construction', () => {
  assert.throws(
    () => new DomainModel('Library', { types: [new Class('Book'), new Class('Book')] }),
    (error: unknown) =>
      error instanceof DuplicateNameError &&
      error.collection === 'types' &&
      error.message === 'The model cannot have types with duplicate names: Book'
  );
});

test('a type named like a primitive clashes with the registry', () => {
  assert.throws(
    () => new DomainModel('Odd', { types: [new DataType('str')] }),
    DuplicateNameError
  );
});

test('a rejected types assignment keeps the previous types', () => {
  const { model, book } = buildLibraryModel();
  const before = [...model.types];

  assert.throws(() => {
    model.addType(new Class('Book'));
  }, DuplicateNameError);
  assert.deepStrictEqual([...model.types], before);

  assert.throws(() => {
    model.types = [new Class('Shelf'), new Class('Shelf')];
  }, DuplicateNameError);
  assert.deepStrictEqual([...model.types], before);
  assert.strictEqual(model.getClassByName('Book'), book);
});

test('addType merges one type into the model', () => {
  const { model } = buildLibraryModel();
  const shelf = new Class('Shelf');

  model.addType(shelf);
  model.addType(shelf);

  assert.strictEqual(model.getClassByName('Shelf'), shelf);
  assert.strictEqual(model.types.size, primitiveDataTypes.size + 4);
});

test('class, enumeration and association queries', () => {
  const { model, book, author, format, writes } = buildLibraryModel();

  assert.deepStrictEqual(model.getClasses(), new Set([book, author]));
  assert.deepStrictEqual(model.getEnumerations(), new Set([format]));
  assert.strictEqual(model.getClassByName('Format'), null);
  assert.strictEqual(model.getTypeByName('Format'), format);
  assert.strictEqual(model.getTypeByName('Missing'), null);
  assert.strictEqual(model.getAssociationByName('Writes'), writes);
  assert.strictEqual(model.getAssociationByName('Reads'), null);
});

test('association, package and constraint names are unique per model', () => {
  const { model, book, author } = buildLibraryModel();

  assert.throws(() => {
    model.addAssociation(
      new BinaryAssociation('Writes', [new Property('a', author), new Property('b', book)])
    );
  }, DuplicateNameError);
  assert.strictEqual(model.associations.size, 1);

  const catalog = new Package('Catalog', [book]);
  model.addPackage(catalog);
  assert.throws(() => {
    model.addPackage(new Package('Catalog'));
  }, DuplicateNameError);
  assert.deepStrictEqual([...model.packages], [catalog]);

  const positive = new Constraint('positiveYear', book, 'self.year > 0');
  model.addConstraint(positive);
  assert.throws(() => {
    model.addConstraint(new Constraint('positiveYear', author, 'true'));
  }, DuplicateNameError);
  assert.deepStrictEqual([...model.constraints], [positive]);
  assert.strictEqual(positive.language, 'OCL');
});

test('generalizations are collected without name checks', () => {
  const { model, book } = buildLibraryModel();
  const ebook = new Class('Ebook');
  const first = new Generalization(book, ebook);
  const second = new Generalization(book, new Class('Audiobook'));

  model.addGeneralization(first);
  model.addGeneralization(second);

  assert.deepStrictEqual([...model.generalizations], [first, second]);
});

test('classesSortedByInheritance puts parents before children for any creation order', () => {
  const orders = [
    ['A', 'B', 'C'],
    ['A', 'C', 'B'],
    ['B', 'A', 'C'],
    ['B', 'C', 'A'],
    ['C', 'A', 'B'],
    ['C', 'B', 'A'],
  ];

  for (const order of orders) {
    const classes = new Map(order.map(name => [name, new Class(name)]));
    const a = classes.get('A');
    const b = classes.get('B');
    const c = classes.get('C');
    assert.ok(a && b && c);
    new Generalization(a, b);
    new Generalization(b, c);
    const model = new DomainModel('Chain', { types: classes.values() });

    const sorted = model.classesSortedByInheritance().map(cls => cls.name);

    assert.strictEqual(sorted.length, 3);
    assert.ok(sorted.indexOf('A') < sorted.indexOf('B'), `A before B for ${order.join('')}`);
    assert.ok(sorted.indexOf('B') < sorted.indexOf('C'), `B before C for ${order.join('')}`);
  }
});

test('classesSortedByInheritance visits every class exactly once', () => {
  const animal = new Class('Animal');
  const dog = new Class('Dog');
  const cat = new Class('Cat');
  const puppy = new Class('Puppy');
  const rock = new Class('Rock');
  new Generalization(animal, dog);
  new Generalization(animal, cat);
  new Generalization(dog, puppy);
  const model = new DomainModel('Zoo', { types: [puppy, rock, cat, dog, animal] });

  const sorted = model.classesSortedByInheritance();

  assert.strictEqual(sorted.length, 5);
  assert.deepStrictEqual(new Set(sorted), new Set([animal, dog, cat, puppy, rock]));
  assert.deepStrictEqual(
    sorted.map(cls => cls.name),
    ['Rock', 'Animal', 'Cat', 'Dog', 'Puppy']
  );
});

test('classesSortedByInheritance reports a generalization cycle', () => {
  const a = new Class('A');
  const b = new Class('B');
  new Generalization(a, b);
  new Generalization(b, a);
  const model = new DomainModel('Loop', { types: [a, b] });

  assert.throws(
    () => model.classesSortedByInheritance(),
    (error: unknown) =>
      error instanceof CyclicGeneralizationError && error.cycle.join(',') === 'A,B,A'
  );
});

test('getElementById finds types, members, literals and association ends', () => {
  const { model, book, hardcover, title, lend, writes, writtenBy } = buildLibraryModel();
  const days = lend.getParameterByName('days');
  assert.ok(days);

  assert.strictEqual(model.getElementById(model.id), model);
  assert.strictEqual(model.getElementById(book.id), book);
  assert.strictEqual(model.getElementById(title.id), title);
  assert.strictEqual(model.getElementById(lend.id), lend);
  assert.strictEqual(model.getElementById(days.id), days);
  assert.strictEqual(model.getElementById(hardcover.id), hardcover);
  assert.strictEqual(model.getElementById(writes.id), writes);
  assert.strictEqual(model.getElementById(writtenBy.id), writtenBy);
  assert.strictEqual(model.getElementById(IntegerType.id), IntegerType);
  assert.strictEqual(model.getElementById(randomUUID()), null);
});

test('getElementById rejects malformed identifiers', () => {
  const { model } = buildLibraryModel();

  assert.throws(
    () => model.getElementById('book-1'),
    (error: unknown) => error instanceof InvalidUUIDError && error.code === 'INVALID_UUID'
  );
});

test('createDomainModel builds a model and exposes the metamodel classes', () => {
  const member = new createDomainModel.Class('Member');
  const model = createDomainModel('Club', { types: [member] });

  assert.ok(model instanceof createDomainModel.DomainModel);
  assert.strictEqual(model.name, 'Club');
  assert.strictEqual(model.getClassByName('Member'), member);
  assert.strictEqual(createDomainModel.Errors.DuplicateNameError, DuplicateNameError);
});

test('Package collects classes without owning them', () => {
  const book = new Class('Book');
  const author = new Class('Author');
  const catalog = new Package('Catalog', [book]);
  const archive = new Package('Archive', [book]);

  catalog.addClass(author);

  assert.deepStrictEqual([...catalog.classes], [book, author]);
  assert.deepStrictEqual([...archive.classes], [book]);
});
