/**
 * Cellar Catalog — Component Catalog Loader
 *
 * Loads the dependency catalog (import library → runtime component) from
 * components.yaml, validates it, and builds the lookup index used by the
 * engine's dependency resolver.
 *
 * Catalog structure:
 *   <catalog_dir>/
 *     components.yaml
 *     schema.json
 *
 * The catalog is static for the life of the process: load it once at
 * startup and share the instance.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import {
  CatalogDocument,
  ComponentInstaller,
  ProvidedBy,
  ValidationError,
  validateCatalog,
  isCatalogDocument,
} from './validator';

/** Default catalog file shipped with this package */
export const DEFAULT_CATALOG_PATH = path.join(__dirname, '..', 'components.yaml');

/** A component the engine can require or install */
export interface RuntimeComponent {
  id: string;
  provided_by: ProvidedBy;
  installer: ComponentInstaller;
}

export class CatalogLoadError extends Error {
  constructor(
    message: string,
    readonly errors: ValidationError[] = [],
  ) {
    super(message);
    this.name = 'CatalogLoadError';
  }
}

export class ComponentCatalog {
  readonly version: number;
  private readonly ordered: RuntimeComponent[];
  private readonly byId = new Map<string, RuntimeComponent>();
  private readonly byLibrary = new Map<string, RuntimeComponent>();
  private readonly ranks = new Map<string, number>();

  private constructor(doc: CatalogDocument) {
    this.version = doc.version;
    this.ordered = doc.components.map((c, index) => {
      const component: RuntimeComponent = Object.freeze({
        id: c.id,
        provided_by: c.provided_by,
        installer: c.installer,
      });
      this.byId.set(c.id, component);
      this.ranks.set(c.id, index);
      for (const library of c.libraries) {
        this.byLibrary.set(library.toLowerCase(), component);
      }
      return component;
    });
  }

  /**
   * Load and validate a catalog file.
   *
   * @throws CatalogLoadError if the file is missing, unparseable or invalid
   */
  static load(filePath: string = DEFAULT_CATALOG_PATH): ComponentCatalog {
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new CatalogLoadError(`Cannot read catalog ${filePath}: ${message}`);
    }

    let doc: unknown;
    try {
      doc = parseYaml(content);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new CatalogLoadError(`Catalog ${filePath} is not valid YAML: ${message}`);
    }

    return ComponentCatalog.fromDocument(doc, filePath);
  }

  /**
   * Build a catalog from an already-parsed document.
   */
  static fromDocument(doc: unknown, source = '<document>'): ComponentCatalog {
    if (!isCatalogDocument(doc)) {
      const { errors } = validateCatalog(doc);
      throw new CatalogLoadError(
        `Catalog ${source} is invalid: ${errors.map((e) => `${e.path} ${e.message}`).join('; ')}`,
        errors,
      );
    }
    return new ComponentCatalog(doc);
  }

  /**
   * Component that provides a library, matched case-insensitively.
   */
  lookup(library: string): RuntimeComponent | undefined {
    return this.byLibrary.get(library.toLowerCase());
  }

  get(id: string): RuntimeComponent | undefined {
    return this.byId.get(id);
  }

  /**
   * Position of a component in the declared install order.
   * Unknown ids sort after every catalog component.
   */
  rank(id: string): number {
    return this.ranks.get(id) ?? Number.MAX_SAFE_INTEGER;
  }

  /**
   * Sort components into the declared install order.
   */
  sortByInstallOrder(components: RuntimeComponent[]): RuntimeComponent[] {
    return [...components].sort((a, b) => this.rank(a.id) - this.rank(b.id));
  }

  components(): RuntimeComponent[] {
    return [...this.ordered];
  }

  libraries(): string[] {
    return Array.from(this.byLibrary.keys()).sort();
  }

  get size(): number {
    return this.ordered.length;
  }
}
