/**
 * Cellar Catalog — Catalog Validator
 *
 * Validates the dependency catalog against the JSON Schema in schema.json,
 * then applies the rules JSON Schema cannot express.
 *
 * Two levels of validation:
 * 1. Schema validation (structure, enums, patterns) via AJV
 * 2. Semantic validation (uniqueness, base-runtime consistency)
 */

import Ajv, { ValidateFunction } from 'ajv';
import * as fs from 'fs';
import * as path from 'path';

export type ProvidedBy = 'base_runtime' | 'must_install';
export type ComponentInstaller = 'none' | 'winetricks' | 'bottles';

/** One component block as written in components.yaml */
export interface CatalogComponentDocument {
  id: string;
  provided_by: ProvidedBy;
  installer: ComponentInstaller;
  libraries: string[];
}

export interface CatalogDocument {
  version: number;
  components: CatalogComponentDocument[];
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  rule: string;
}

const SCHEMA_PATH = path.join(__dirname, '..', 'schema.json');

let _validate: ValidateFunction<CatalogDocument> | null = null;

function getValidator(): ValidateFunction<CatalogDocument> {
  if (_validate) return _validate;

  const schemaContent = fs.readFileSync(SCHEMA_PATH, 'utf-8');
  const schema = JSON.parse(schemaContent);

  const ajv = new Ajv({ allErrors: true, strict: false });
  _validate = ajv.compile<CatalogDocument>(schema);
  return _validate;
}

/**
 * Validate a parsed catalog document against the schema + semantic rules.
 */
export function validateCatalog(doc: unknown): ValidationResult {
  const validate = getValidator();

  if (!validate(doc)) {
    return {
      valid: false,
      errors: (validate.errors ?? []).map((err) => ({
        path: err.instancePath || '/',
        message: err.message || 'Unknown validation error',
        rule: `schema:${err.keyword}`,
      })),
    };
  }

  const errors = validateSemanticRules(doc);
  return { valid: errors.length === 0, errors };
}

/**
 * Narrowing form of validateCatalog for callers that need the typed document.
 */
export function isCatalogDocument(doc: unknown): doc is CatalogDocument {
  return validateCatalog(doc).valid;
}

function validateSemanticRules(doc: CatalogDocument): ValidationError[] {
  const errors: ValidationError[] = [];
  const seenIds = new Set<string>();
  const libraryOwners = new Map<string, string>();

  doc.components.forEach((component, index) => {
    const at = `/components/${index}`;

    if (seenIds.has(component.id)) {
      errors.push({
        path: `${at}/id`,
        message: `Duplicate component id "${component.id}"`,
        rule: 'semantic:unique-component-id',
      });
    }
    seenIds.add(component.id);

    const isBase = component.provided_by === 'base_runtime';
    if (isBase !== (component.installer === 'none')) {
      errors.push({
        path: `${at}/installer`,
        message: isBase
          ? `Base-runtime component "${component.id}" must use installer "none"`
          : `Component "${component.id}" must name a winetricks or bottles installer`,
        rule: 'semantic:base-runtime-installer',
      });
    }

    component.libraries.forEach((library, libIndex) => {
      if (library !== library.toLowerCase()) {
        errors.push({
          path: `${at}/libraries/${libIndex}`,
          message: `Library name "${library}" must be lowercase`,
          rule: 'semantic:lowercase-library',
        });
      }

      const key = library.toLowerCase();
      const owner = libraryOwners.get(key);
      if (owner !== undefined) {
        errors.push({
          path: `${at}/libraries/${libIndex}`,
          message: `Library "${library}" is already mapped to "${owner}"`,
          rule: 'semantic:unique-library',
        });
      } else {
        libraryOwners.set(key, component.id);
      }
    });
  });

  return errors;
}

/**
 * Compare two catalog versions and list every change that breaks the
 * append-only rule. An empty list means `next` is a valid successor.
 */
export function checkAppendOnly(previous: CatalogDocument, next: CatalogDocument): string[] {
  const violations: string[] = [];

  if (next.version <= previous.version) {
    violations.push(`version must increase (was ${previous.version}, got ${next.version})`);
  }

  const nextOrder = next.components.map((c) => c.id);
  const previousOrder = previous.components.map((c) => c.id);

  for (const id of previousOrder) {
    if (!nextOrder.includes(id)) {
      violations.push(`component "${id}" was removed`);
    }
  }

  const kept = nextOrder.filter((id) => previousOrder.includes(id));
  const expected = previousOrder.filter((id) => nextOrder.includes(id));
  if (kept.join('\n') !== expected.join('\n')) {
    violations.push('existing components were reordered');
  }

  const nextOwners = new Map<string, string>();
  for (const component of next.components) {
    for (const library of component.libraries) {
      nextOwners.set(library.toLowerCase(), component.id);
    }
  }

  for (const component of previous.components) {
    for (const library of component.libraries) {
      const owner = nextOwners.get(library.toLowerCase());
      if (owner === undefined) {
        violations.push(`library "${library}" was removed`);
      } else if (owner !== component.id) {
        violations.push(`library "${library}" was remapped from "${component.id}" to "${owner}"`);
      }
    }
  }

  return violations;
}
