import type { ColorScheme, CornerColors } from './types.js';

const freezeCorner = ([first, second, third]: CornerColors): CornerColors => Object.freeze([first, second, third] as const);

/**
 * Labels run clockwise from each corner's top/bottom sticker. Corners are
 * listed top layer first, counter-clockwise from front-left, then the bottom
 * layer in the same order.
 */
export const DEFAULT_COLOR_SCHEME: ColorScheme = Object.freeze({
  id: 'standard',
  corners: Object.freeze(
    (
      [
        ['W', 'R', 'G'],
        ['W', 'B', 'R'],
        ['W', 'O', 'B'],
        ['W', 'G', 'O'],
        ['Y', 'G', 'R'],
        ['Y', 'R', 'B'],
        ['Y', 'B', 'O'],
        ['Y', 'O', 'G'],
      ] as const
    ).map(freezeCorner),
  ),
});
