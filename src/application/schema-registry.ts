import { readdirSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import type { SchemaObject, ValidateFunction } from 'ajv';
import AjvDraft04 from 'ajv-draft-04';
import { ConfigurationError, errorMessage } from './errors.js';
import { widenBigInts } from './json-document.js';

// CommonJS module: the class is on `.default` under NodeNext.
const Ajv = AjvDraft04.default;

const SCHEMA_FILE = /^(.+)\.(\d+)\.schema\.json$/;

const DEFAULT_SCHEMA = {
  $schema: 'http://json-schema.org/draft-04/schema#',
  type: 'object',
  title: 'default_schema',
  properties: {},
};

export interface Schema {
  /** `<docType>.<version>` for loaded schemas, `default` for the fallback. */
  readonly name: string;
  readonly validate: ValidateFunction;
}

export type ValidationResult =
  | { readonly valid: true }
  | { readonly valid: false; readonly error: string };

/**
 * Compiled JSON schemas indexed by docType and integer version.
 *
 * Expects one directory per docType under the root, each holding files
 * named `<docType>.<version>.schema.json`. Read-only once loaded.
 */
export class SchemaRegistry {
  private readonly ajv = new Ajv({ strict: false, allErrors: false, validateFormats: false });
  private readonly schemas = new Map<string, Map<number, Schema>>();
  readonly defaultSchema: Schema;

  constructor() {
    this.defaultSchema = { name: 'default', validate: this.ajv.compile(DEFAULT_SCHEMA) };
  }

  /**
   * Loads every schema below `rootPath`.
   *
   * @throws {ConfigurationError} when the root is unreadable or any schema file
   *   fails to parse or compile.
   */
  static load(rootPath: string): SchemaRegistry {
    const registry = new SchemaRegistry();

    let docTypeDirs: string[];
    try {
      docTypeDirs = readdirSync(rootPath);
    } catch (err: unknown) {
      throw new ConfigurationError(`schema_path ${rootPath}: ${errorMessage(err)}`, { cause: err });
    }

    for (const dirName of docTypeDirs) {
      if (dirName.startsWith('.')) continue;
      const dirPath = join(rootPath, dirName);

      let fileNames: string[];
      try {
        if (!statSync(dirPath).isDirectory()) continue;
        fileNames = readdirSync(dirPath);
      } catch (err: unknown) {
        throw new ConfigurationError(`${dirPath}: ${errorMessage(err)}`, { cause: err });
      }

      for (const fileName of fileNames) {
        const match = SCHEMA_FILE.exec(fileName);
        if (!match) continue;
        const [, docType = '', version = '0'] = match;

        try {
          const source: unknown = JSON.parse(readFileSync(join(dirPath, fileName), 'utf8'));
          registry.register(docType, Number(version), source);
        } catch (err: unknown) {
          throw new ConfigurationError(`${fileName}: ${errorMessage(err)}`, { cause: err });
        }
      }
    }

    return registry;
  }

  /** Compiles and indexes one schema document. Throws if it does not compile. */
  register(docType: string, version: number, source: unknown): void {
    if (!isSchemaObject(source)) {
      throw new TypeError('schema must be a JSON object');
    }
    const validate = this.ajv.compile(source);

    let versions = this.schemas.get(docType);
    if (!versions) {
      versions = new Map();
      this.schemas.set(docType, versions);
    }
    versions.set(version, { name: `${docType}.${version}`, validate });
  }

  /**
   * Returns the schema for (docType, version), or the default schema on a
   * miss along either axis. Never throws.
   */
  lookup(docType: string | undefined, version: unknown): Schema {
    const versions = this.schemas.get(docType ?? '');
    if (!versions) return this.defaultSchema;
    return versions.get(coerceVersion(version)) ?? this.defaultSchema;
  }

  get docTypes(): string[] {
    return [...this.schemas.keys()];
  }

  /** Integers parsed as bigint are checked as the numbers they round to. */
  validate(schema: Schema, document: unknown): ValidationResult {
    if (schema.validate(widenBigInts(document))) return { valid: true };

    const first = schema.validate.errors?.[0];
    if (!first) return { valid: false, error: 'document rejected' };
    const where = first.instancePath === '' ? '#' : `#${first.instancePath}`;
    return { valid: false, error: `${where} ${first.message ?? 'is invalid'}` };
  }
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Numbers and numeric strings are taken as-is, so a fractional version
 * matches no schema file; anything else is version 1.
 */
export function coerceVersion(version: unknown): number {
  const n = typeof version === 'number'
    ? version
    : typeof version === 'string' && version.trim() !== '' ? Number(version) : NaN;
  return Number.isFinite(n) ? n : 1;
}
