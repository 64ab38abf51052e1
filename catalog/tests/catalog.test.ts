/**
 * Cellar Catalog — Tests
 *
 * Tests for the validator, loader, and the shipped components.yaml.
 */

import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  ComponentCatalog,
  CatalogLoadError,
  CatalogDocument,
  validateCatalog,
  checkAppendOnly,
} from '../src';

// ─── Helper: Minimal Valid Catalog ───────────────────────────

function minimalCatalog(overrides?: Partial<CatalogDocument>): CatalogDocument {
  return {
    version: 1,
    components: [
      { id: 'builtin', provided_by: 'base_runtime', installer: 'none', libraries: ['kernel32.dll'] },
      { id: 'vcrun2019', provided_by: 'must_install', installer: 'winetricks', libraries: ['msvcp140.dll', 'vcruntime140.dll'] },
      { id: 'dxvk', provided_by: 'must_install', installer: 'bottles', libraries: ['d3d11.dll'] },
    ],
    ...overrides,
  };
}

// ─── Validator Tests ─────────────────────────────────────────

describe('Catalog Validator', () => {
  it('should accept a minimal valid catalog', () => {
    const result = validateCatalog(minimalCatalog());
    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
  });

  it('should reject a catalog without components', () => {
    const result = validateCatalog({ version: 1 });
    expect(result.valid).toBe(false);
    expect(result.errors.some((e) => e.rule === 'schema:required')).toBe(true);
  });

  it('should reject an unknown provided_by value', () => {
    const doc = minimalCatalog();
    const result = validateCatalog({
      ...doc,
      components: [{ ...doc.components[0], provided_by: 'sometimes' }],
    });
    expect(result.valid).toBe(false);
    expect(result.errors.some((e) => e.rule === 'schema:enum')).toBe(true);
  });

  it('should flag duplicate component ids', () => {
    const doc = minimalCatalog();
    doc.components.push({ id: 'dxvk', provided_by: 'must_install', installer: 'bottles', libraries: ['dxgi.dll'] });
    const result = validateCatalog(doc);
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.rule)).toEqual(['semantic:unique-component-id']);
  });

  it('should flag a library mapped to two components', () => {
    const doc = minimalCatalog();
    doc.components.push({ id: 'vcrun2022', provided_by: 'must_install', installer: 'winetricks', libraries: ['msvcp140.dll'] });
    const result = validateCatalog(doc);
    expect(result.valid).toBe(false);
    expect(result.errors[0].rule).toBe('semantic:unique-library');
    expect(result.errors[0].path).toBe('/components/3/libraries/0');
  });

  it('should flag uppercase library names', () => {
    const doc = minimalCatalog();
    doc.components[1].libraries = ['MSVCP140.dll'];
    const result = validateCatalog(doc);
    expect(result.errors.map((e) => e.rule)).toEqual(['semantic:lowercase-library']);
  });

  it('should require base-runtime components to use installer none', () => {
    const doc = minimalCatalog();
    doc.components[0].installer = 'winetricks';
    const result = validateCatalog(doc);
    expect(result.errors.map((e) => e.rule)).toEqual(['semantic:base-runtime-installer']);
  });
});

// ─── Append-only Rule ────────────────────────────────────────

describe('checkAppendOnly', () => {
  it('should accept appended components and libraries', () => {
    const previous = minimalCatalog();
    const next = minimalCatalog({ version: 2 });
    next.components[1].libraries.push('msvcp140_1.dll');
    next.components.push({ id: 'vkd3d', provided_by: 'must_install', installer: 'bottles', libraries: ['d3d12.dll'] });
    expect(checkAppendOnly(previous, next)).toEqual([]);
  });

  it('should report removed and remapped entries', () => {
    const previous = minimalCatalog();
    const next: CatalogDocument = {
      version: 2,
      components: [
        { id: 'builtin', provided_by: 'base_runtime', installer: 'none', libraries: ['kernel32.dll', 'd3d11.dll'] },
        { id: 'vcrun2019', provided_by: 'must_install', installer: 'winetricks', libraries: ['msvcp140.dll'] },
      ],
    };
    expect(checkAppendOnly(previous, next)).toEqual([
      'component "dxvk" was removed',
      'library "vcruntime140.dll" was removed',
      'library "d3d11.dll" was remapped from "dxvk" to "builtin"',
    ]);
  });

  it('should report reordering and a stale version', () => {
    const previous = minimalCatalog();
    const next = minimalCatalog();
    next.components.reverse();
    expect(checkAppendOnly(previous, next)).toEqual([
      'version must increase (was 1, got 1)',
      'existing components were reordered',
    ]);
  });
});

// ─── Catalog Loader Tests ────────────────────────────────────

describe('ComponentCatalog', () => {
  it('should load the shipped catalog', () => {
    const catalog = ComponentCatalog.load();
    expect(catalog.size).toBeGreaterThanOrEqual(20);
    expect(catalog.get('builtin')?.provided_by).toBe('base_runtime');
    expect(catalog.get('dxvk')?.installer).toBe('bottles');
  });

  it('should look up libraries case-insensitively', () => {
    const catalog = ComponentCatalog.load();
    expect(catalog.lookup('D3DCOMPILER_47.DLL')?.id).toBe('d3dcompiler_47');
    expect(catalog.lookup('MSVCP140.dll')?.id).toBe('vcrun2019');
    expect(catalog.lookup('kernel32.dll')?.id).toBe('builtin');
    expect(catalog.lookup('foo.dll')).toBeUndefined();
  });

  it('should sort components into declared order', () => {
    const catalog = ComponentCatalog.fromDocument(minimalCatalog());
    const dxvk = catalog.get('dxvk');
    const vcrun = catalog.get('vcrun2019');
    expect(dxvk).toBeDefined();
    expect(vcrun).toBeDefined();
    if (!dxvk || !vcrun) return;
    expect(catalog.sortByInstallOrder([dxvk, vcrun]).map((c) => c.id)).toEqual(['vcrun2019', 'dxvk']);
    expect(catalog.rank('unknown')).toBe(Number.MAX_SAFE_INTEGER);
  });

  it('should throw CatalogLoadError for an invalid document', () => {
    expect(() => ComponentCatalog.fromDocument({ version: 0, components: [] })).toThrow(CatalogLoadError);
  });

  it('should throw CatalogLoadError for a missing file', () => {
    const missing = path.join(os.tmpdir(), 'cellar-catalog-missing', 'components.yaml');
    expect(() => ComponentCatalog.load(missing)).toThrow(/Cannot read catalog/);
  });

  it('should load a catalog written as YAML', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cellar-catalog-'));
    const file = path.join(dir, 'components.yaml');
    fs.writeFileSync(
      file,
      [
        'version: 7',
        'components:',
        '  - id: builtin',
        '    provided_by: base_runtime',
        '    installer: none',
        '    libraries: [kernel32.dll]',
        '',
      ].join('\n'),
    );
    try {
      const catalog = ComponentCatalog.load(file);
      expect(catalog.version).toBe(7);
      expect(catalog.libraries()).toEqual(['kernel32.dll']);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
