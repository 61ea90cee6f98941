import { invalidActionError } from './runtime-error.js';
import type { CornerAction, GeneratorAction, InverseAction } from './types.js';

export const GENERATOR_ACTIONS: readonly GeneratorAction[] = Object.freeze(['R', 'T', 'B'] as const);

export const CORNER_ACTIONS: readonly CornerAction[] = Object.freeze(['R', 'T', 'B', 'r', 't', 'b'] as const);

const INVERSE_ACTIONS: Readonly<Record<CornerAction, CornerAction>> = Object.freeze({
  R: 'r',
  r: 'R',
  T: 't',
  t: 'T',
  B: 'b',
  b: 'B',
});

export const isCornerAction = (value: unknown): value is CornerAction =>
  typeof value === 'string' && Object.prototype.hasOwnProperty.call(INVERSE_ACTIONS, value);

export const isGeneratorAction = (action: CornerAction): action is GeneratorAction =>
  action === 'R' || action === 'T' || action === 'B';

export const inverseAction = (action: CornerAction): CornerAction => {
  if (!isCornerAction(action)) {
    throw invalidActionError(action);
  }
  return INVERSE_ACTIONS[action];
};

export const generatorOf = (action: InverseAction): GeneratorAction => {
  switch (action) {
    case 'r':
      return 'R';
    case 't':
      return 'T';
    case 'b':
      return 'B';
  }
};
