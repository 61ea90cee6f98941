import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { hasErrorDiagnostics } from './diagnostics.js';
import type { Diagnostic } from './diagnostics.js';
import { ColorSchemeSchema } from './schemas.js';
import type { ColorSchemeAsset } from './schemas.js';
import type { ColorScheme } from './types.js';

export const STICKERS_PER_COLOR = 4;

export interface LoadColorSchemeResult {
  readonly scheme: ColorScheme | null;
  readonly diagnostics: readonly Diagnostic[];
}

export function loadColorSchemeFromFile(assetPath: string): LoadColorSchemeResult {
  const fileResult = readSchemeFile(assetPath);
  if (fileResult.diagnostic !== undefined) {
    return { scheme: null, diagnostics: [fileResult.diagnostic] };
  }
  return parseColorScheme(fileResult.value, assetPath);
}

export function parseColorScheme(value: unknown, assetPath?: string): LoadColorSchemeResult {
  const parsed = ColorSchemeSchema.safeParse(value);
  if (!parsed.success) {
    return {
      scheme: null,
      diagnostics: parsed.error.issues.map((issue): Diagnostic => ({
        code: 'COLOR_SCHEME_SCHEMA_INVALID',
        path: issue.path.length > 0 ? `scheme.${issue.path.join('.')}` : 'scheme',
        severity: 'error',
        message: issue.message,
        ...(assetPath === undefined ? {} : { assetPath }),
      })),
    };
  }

  const diagnostics = consistencyDiagnostics(parsed.data, assetPath);
  if (hasErrorDiagnostics(diagnostics)) {
    return { scheme: null, diagnostics };
  }

  return {
    scheme: Object.freeze({
      id: parsed.data.id,
      corners: Object.freeze(parsed.data.corners.map((corner) => Object.freeze(corner))),
    }),
    diagnostics: [],
  };
}

function consistencyDiagnostics(asset: ColorSchemeAsset, assetPath: string | undefined): readonly Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const location = assetPath === undefined ? {} : { assetPath };
  const counts = new Map<string, number>();

  asset.corners.forEach((corner, index) => {
    if (new Set(corner).size !== corner.length) {
      diagnostics.push({
        code: 'COLOR_SCHEME_CORNER_DUPLICATE_LABEL',
        path: `scheme.corners.${index}`,
        severity: 'error',
        message: `Corner ${index} repeats a label: ${corner.join(',')}.`,
        ...location,
      });
    }
    for (const label of corner) {
      counts.set(label, (counts.get(label) ?? 0) + 1);
    }
  });

  for (const [label, count] of [...counts.entries()].sort(([left], [right]) => left.localeCompare(right))) {
    if (count !== STICKERS_PER_COLOR) {
      diagnostics.push({
        code: 'COLOR_SCHEME_LABEL_COUNT',
        path: 'scheme.corners',
        severity: 'error',
        message: `Label "${label}" appears ${count} times; each color covers one face of ${STICKERS_PER_COLOR} stickers.`,
        ...location,
      });
    }
  }

  return diagnostics;
}

function readSchemeFile(assetPath: string): { readonly value: unknown; readonly diagnostic?: Diagnostic } {
  const extension = extname(assetPath).toLowerCase();
  if (extension !== '.json' && extension !== '.yaml' && extension !== '.yml') {
    return {
      value: null,
      diagnostic: {
        code: 'COLOR_SCHEME_FORMAT_UNSUPPORTED',
        path: 'scheme.file',
        severity: 'error',
        message: `Unsupported color scheme format "${extension || '(none)'}".`,
        suggestion: 'Use .json, .yaml, or .yml files.',
        assetPath,
      },
    };
  }

  try {
    const source = readFileSync(assetPath, 'utf8');
    return {
      value: extension === '.json' ? JSON.parse(source) : parseYaml(source),
    };
  } catch (error) {
    return {
      value: null,
      diagnostic: {
        code: 'COLOR_SCHEME_PARSE_ERROR',
        path: 'scheme.file',
        severity: 'error',
        message: `Failed to parse color scheme file: ${formatError(error)}.`,
        suggestion: 'Fix file syntax and try loading again.',
        assetPath,
      },
    };
  }
}

function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
