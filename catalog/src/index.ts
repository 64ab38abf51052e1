/**
 * Cellar Catalog — Public API
 *
 * Main entry point for the catalog package.
 * Exports the ComponentCatalog class, validator, and types.
 */

export { ComponentCatalog, CatalogLoadError, DEFAULT_CATALOG_PATH } from './loader';
export type { RuntimeComponent } from './loader';
export { validateCatalog, isCatalogDocument, checkAppendOnly } from './validator';
export type {
  CatalogDocument,
  CatalogComponentDocument,
  ComponentInstaller,
  ProvidedBy,
  ValidationResult,
  ValidationError,
} from './validator';
