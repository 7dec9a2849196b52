import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import Ajv, { type SchemaObject } from 'ajv';

const ajv = new Ajv({ allErrors: true });

/**
 * Finds a file below `catalog/`, whether the process runs from the project
 * root, from `dist/` or from the sources under test.
 */
export function resolveCatalogPath(relativePath: string, override?: string): string {
  const candidates = [
    override,
    join(process.cwd(), 'catalog', relativePath),
    join(__dirname, '..', '..', 'catalog', relativePath),
    join(__dirname, '..', '..', '..', 'catalog', relativePath),
  ].filter((candidate): candidate is string => !!candidate);
  const found = candidates.find((candidate) => existsSync(candidate));
  if (!found) {
    throw new Error(
      `Catalog file ${relativePath} not found (looked in ${candidates.join(', ')})`,
    );
  }
  return found;
}

export function readCatalogData(path: string): unknown {
  const raw = readFileSync(path, 'utf-8');
  return path.endsWith('.json') ? JSON.parse(raw) : yaml.load(raw);
}

export function formatSchemaErrors(
  errors: ReadonlyArray<{ instancePath: string; message?: string }> | null | undefined,
): string[] {
  return (errors ?? []).map(
    (error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`,
  );
}

export type CatalogValidator<T> = (
  data: unknown,
) => { valid: true; value: T } | { valid: false; errors: string[] };

/**
 * Compiles the JSON schema stored at `catalog/schemas/<schemaFile>` into a
 * validator.
 */
export function compileCatalogSchema<T>(schemaFile: string): CatalogValidator<T> {
  const raw = readFileSync(resolveCatalogPath(join('schemas', schemaFile)), 'utf-8');
  const schema: SchemaObject = JSON.parse(raw);
  const validate = ajv.compile<T>(schema);
  return (data) => {
    if (validate(data)) {
      return { valid: true, value: data };
    }
    return { valid: false, errors: formatSchemaErrors(validate.errors) };
  };
}

export function loadCatalogFile<T>(
  relativePath: string,
  schemaFile: string,
  override?: string,
): T {
  const path = resolveCatalogPath(relativePath, override);
  const parsed = readCatalogData(path);
  const result = compileCatalogSchema<T>(schemaFile)(parsed);
  if (!result.valid) {
    throw new Error(`Catalog file ${path} is invalid: ${result.errors.join('; ')}`);
  }
  return result.value;
}
