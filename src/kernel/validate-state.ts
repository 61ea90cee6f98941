import { hasErrorDiagnostics } from './diagnostics.js';
import type { Diagnostic } from './diagnostics.js';
import { invalidStateError } from './runtime-error.js';
import { CornerStateSchema } from './schemas.js';
import { freezeState } from './state.js';
import type { CornerState, Orientation } from './types.js';

const permutationDiagnostics = (cornerPos: readonly number[]): readonly Diagnostic[] => {
  const seenAt = new Map<number, number>();
  const diagnostics: Diagnostic[] = [];
  cornerPos.forEach((corner, slot) => {
    const previous = seenAt.get(corner);
    if (previous !== undefined) {
      diagnostics.push({
        code: 'STATE_CORNER_POS_NOT_PERMUTATION',
        path: `state.cornerPos[${slot}]`,
        severity: 'error',
        message: `Corner ${corner} occupies both slot ${previous} and slot ${slot}.`,
        suggestion: 'cornerPos must list each corner 0..7 exactly once.',
      });
      return;
    }
    seenAt.set(corner, slot);
  });
  return diagnostics;
};

export const validateState = (value: unknown): readonly Diagnostic[] => {
  const parsed = CornerStateSchema.safeParse(value);
  if (!parsed.success) {
    return parsed.error.issues.map((issue): Diagnostic => ({
      code: 'STATE_SCHEMA_INVALID',
      path: issue.path.length > 0 ? `state.${issue.path.join('.')}` : 'state',
      severity: 'error',
      message: issue.message,
    }));
  }
  return permutationDiagnostics(parsed.data.cornerPos);
};

export function assertValidState(value: unknown): asserts value is CornerState {
  const diagnostics = validateState(value);
  if (hasErrorDiagnostics(diagnostics)) {
    throw invalidStateError('Corner state violates its invariants', diagnostics);
  }
}

export const createState = (cornerPos: readonly number[], cornerOrt: readonly Orientation[]): CornerState => {
  const candidate = { cornerPos: [...cornerPos], cornerOrt: [...cornerOrt] };
  assertValidState(candidate);
  return freezeState(candidate.cornerPos, candidate.cornerOrt);
};
