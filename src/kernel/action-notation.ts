import { isCornerAction } from './actions.js';
import { invalidActionError } from './runtime-error.js';
import type { ActionToken, CornerAction } from './types.js';

const ACTION_TOKENS: Readonly<Record<CornerAction, ActionToken>> = Object.freeze({
  R: 'R+',
  T: 'U+',
  B: 'B+',
  r: 'R-',
  t: 'U-',
  b: 'B-',
});

const ACTIONS_BY_TOKEN: ReadonlyMap<string, CornerAction> = new Map<string, CornerAction>(
  Object.entries(ACTION_TOKENS).flatMap(([action, token]) => (isCornerAction(action) ? [[token, action] as const] : [])),
);

export const renderAction = (action: CornerAction): ActionToken => {
  if (!isCornerAction(action)) {
    throw invalidActionError(action);
  }
  return ACTION_TOKENS[action];
};

export const parseAction = (token: string): CornerAction | null => ACTIONS_BY_TOKEN.get(token) ?? null;

export const parseActionSequence = (text: string): readonly CornerAction[] | null => {
  const tokens = text.split(/\s+/u).filter((token) => token.length > 0);
  const actions: CornerAction[] = [];
  for (const token of tokens) {
    const action = parseAction(token);
    if (action === null) {
      return null;
    }
    actions.push(action);
  }
  return actions;
};

export const formatActionSequence = (actions: readonly CornerAction[]): string => actions.map(renderAction).join(' ');
