import * as assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it } from 'node:test';
import { fileURLToPath } from 'node:url';

import {
  DEFAULT_COLOR_SCHEME,
  loadColorSchemeFromFile,
  parseColorScheme,
} from '../../../src/kernel/index.js';

const STANDARD_SCHEME_PATH = fileURLToPath(new URL('../../../data/color-schemes/standard.yaml', import.meta.url));

const standardAsset = () => ({
  id: 'standard',
  version: 1,
  corners: DEFAULT_COLOR_SCHEME.corners.map((corner) => [...corner]),
});

describe('loadColorSchemeFromFile', () => {
  it('loads the shipped standard scheme, equal to the built-in default', () => {
    const result = loadColorSchemeFromFile(STANDARD_SCHEME_PATH);
    assert.deepEqual(result.diagnostics, []);
    assert.deepEqual(result.scheme, DEFAULT_COLOR_SCHEME);
  });

  it('loads JSON files', () => {
    const dir = mkdtempSync(join(tmpdir(), 'corner-cube-scheme-'));
    try {
      const path = join(dir, 'scheme.json');
      writeFileSync(path, JSON.stringify({ ...standardAsset(), id: 'from-json' }));

      const result = loadColorSchemeFromFile(path);
      assert.deepEqual(result.diagnostics, []);
      assert.equal(result.scheme?.id, 'from-json');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('rejects unsupported extensions', () => {
    const result = loadColorSchemeFromFile('scheme.txt');
    assert.equal(result.scheme, null);
    assert.deepEqual(result.diagnostics, [
      {
        code: 'COLOR_SCHEME_FORMAT_UNSUPPORTED',
        path: 'scheme.file',
        severity: 'error',
        message: 'Unsupported color scheme format ".txt".',
        suggestion: 'Use .json, .yaml, or .yml files.',
        assetPath: 'scheme.txt',
      },
    ]);
  });

  it('reports unreadable files as parse errors', () => {
    const dir = mkdtempSync(join(tmpdir(), 'corner-cube-scheme-'));
    try {
      const result = loadColorSchemeFromFile(join(dir, 'missing.yaml'));
      assert.equal(result.scheme, null);
      assert.equal(result.diagnostics[0]?.code, 'COLOR_SCHEME_PARSE_ERROR');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('parseColorScheme', () => {
  it('reports schema violations with their paths', () => {
    const result = parseColorScheme({ ...standardAsset(), version: 2 });
    assert.equal(result.scheme, null);
    assert.deepEqual(
      result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.path]),
      [['COLOR_SCHEME_SCHEMA_INVALID', 'scheme.version']],
    );
  });

  it('reports a corner that repeats a label and the counts it unbalances', () => {
    const asset = standardAsset();
    asset.corners[0] = ['W', 'W', 'G'];
    const result = parseColorScheme(asset);
    assert.equal(result.scheme, null);
    assert.deepEqual(
      result.diagnostics.map((diagnostic) => diagnostic.message),
      [
        'Corner 0 repeats a label: W,W,G.',
        'Label "R" appears 3 times; each color covers one face of 4 stickers.',
        'Label "W" appears 5 times; each color covers one face of 4 stickers.',
      ],
    );
  });
});
