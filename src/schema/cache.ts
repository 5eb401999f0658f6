import type { Directory } from '../types.js';
import { Schema } from './schema.js';

const schemas = new WeakMap<Directory, Promise<Schema>>();

/**
 * The parsed schema of `directory`, loaded on first use and shared by every
 * entry of that directory. A failed load is forgotten so the next call retries.
 */
export function schemaFor(directory: Directory): Promise<Schema> {
  const cached = schemas.get(directory);
  if (cached !== undefined) return cached;

  const loading: Promise<Schema> = directory
    .schema()
    .then((raw) => new Schema(raw, directory.logger !== undefined ? { logger: directory.logger } : {}))
    .catch((err: unknown) => {
      if (schemas.get(directory) === loading) schemas.delete(directory);
      throw err;
    });
  schemas.set(directory, loading);
  return loading;
}

/** Drops the cached schema, e.g. after the directory's schema changed. */
export function forgetSchema(directory: Directory): void {
  schemas.delete(directory);
}
