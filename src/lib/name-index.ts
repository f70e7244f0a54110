import { DuplicateNameError } from './errors.js';
import { debug } from './runtime.js';

export interface Named {
  name: string;
}

/**
 * Collect the names that occur more than once in the provided elements, in
 * first-seen order.
 * @param elements Elements to scan.
 * @returns Duplicated names, each listed once.
 */
export function findDuplicateNames(elements: Iterable<Named>): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const element of elements) {
    if (seen.has(element.name)) {
      duplicates.add(element.name);
    }
    seen.add(element.name);
  }
  return [...duplicates];
}

/**
 * Throw when two elements of a candidate collection share a name.
 * @param elements Candidate collection.
 * @param owner Phrase naming the container, e.g. "A class".
 * @param collection Plural name of the collection, e.g. "attributes".
 */
export function assertUniqueNames(
  elements: Iterable<Named>,
  owner: string,
  collection: string
): void {
  const duplicates = findDuplicateNames(elements);
  if (duplicates.length > 0) {
    const message = `${owner} cannot have ${collection} with duplicate names: ${duplicates.join(', ')}`;
    debug.error(message);
    throw new DuplicateNameError(message, duplicates, collection);
  }
}

/**
 * Throw when `candidate` would clash with a member already in `existing`.
 * @param existing Current collection.
 * @param candidate Element about to be added.
 * @param owner Phrase naming the container, e.g. "A class".
 * @param collection Singular kind being added, e.g. "attribute".
 */
export function assertNameAvailable(
  existing: Iterable<Named>,
  candidate: Named,
  owner: string,
  collection: string
): void {
  for (const element of existing) {
    if (element !== candidate && element.name === candidate.name) {
      const message = `${owner} cannot have two ${collection}s with the same name: '${candidate.name}'`;
      debug.error(message);
      throw new DuplicateNameError(message, [candidate.name], `${collection}s`);
    }
  }
}
