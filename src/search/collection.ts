/**
 * Collection naming
 *
 * Every project stores its chunks under a collection name derived from the
 * project name. Names are limited to [A-Za-z0-9_-], 3-63 characters, and
 * start and end with an alphanumeric character.
 */

const MAX_LENGTH = 63;
const MIN_LENGTH = 3;

export function toCollectionName(projectName: string): string {
  let name = projectName
    .replace(/[^A-Za-z0-9-]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^[^A-Za-z0-9]+/, '')
    .replace(/[^A-Za-z0-9]+$/, '');

  if (name.length < MIN_LENGTH) {
    name = `${name}_collection`.replace(/^_/, '');
  }

  return name.slice(0, MAX_LENGTH).replace(/[^A-Za-z0-9]+$/, '');
}

/**
 * Variant used when two project names map to the same collection.
 * `attempt` starts at 2.
 */
export function withCollectionSuffix(collection: string, attempt: number): string {
  const suffix = `_${attempt}`;
  return collection.slice(0, MAX_LENGTH - suffix.length) + suffix;
}
