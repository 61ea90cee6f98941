import { DEFAULT_COLOR_SCHEME } from './color-scheme.js';
import { assertStateShape, readSlot } from './state.js';
import type {
  ColorLabel,
  ColorScheme,
  CornerColors,
  CornerState,
  FaceCells,
  FaceName,
  Orientation,
  RenderedState,
  SlotPlacement,
} from './types.js';

export const FACE_NAMES: readonly FaceName[] = Object.freeze(['top', 'left', 'back', 'front', 'right', 'bottom'] as const);

export const FACE_CELL_COUNT = 4;

const freezePlacement = ([first, second, third]: SlotPlacement): SlotPlacement =>
  Object.freeze([Object.freeze({ ...first }), Object.freeze({ ...second }), Object.freeze({ ...third })] as const);

// Where each slot's three post-rotation stickers land, in label order.
const PLACEMENT_ROWS: readonly SlotPlacement[] = [
  [{ face: 'top', cell: 2 }, { face: 'front', cell: 0 }, { face: 'left', cell: 1 }],
  [{ face: 'top', cell: 3 }, { face: 'right', cell: 0 }, { face: 'front', cell: 1 }],
  [{ face: 'top', cell: 1 }, { face: 'back', cell: 0 }, { face: 'right', cell: 1 }],
  [{ face: 'top', cell: 0 }, { face: 'left', cell: 0 }, { face: 'back', cell: 1 }],
  [{ face: 'bottom', cell: 0 }, { face: 'left', cell: 3 }, { face: 'front', cell: 2 }],
  [{ face: 'bottom', cell: 1 }, { face: 'front', cell: 3 }, { face: 'right', cell: 2 }],
  [{ face: 'bottom', cell: 3 }, { face: 'right', cell: 3 }, { face: 'back', cell: 2 }],
  [{ face: 'bottom', cell: 2 }, { face: 'back', cell: 3 }, { face: 'left', cell: 2 }],
];

export const SLOT_PLACEMENTS: readonly SlotPlacement[] = Object.freeze(PLACEMENT_ROWS.map(freezePlacement));

export const rotateCornerColors = (colors: CornerColors, orientation: Orientation): CornerColors => {
  const [first, second, third] = colors;
  switch (orientation) {
    case 0:
      return colors;
    case 1:
      return [third, first, second];
    case 2:
      return [second, third, first];
  }
};

const toFaceCells = (face: FaceName, cells: readonly (ColorLabel | undefined)[]): FaceCells => {
  const read = (cell: number): ColorLabel => {
    const label = cells[cell];
    if (label === undefined) {
      throw new Error(`render left ${face}[${cell}] unfilled`);
    }
    return label;
  };
  return Object.freeze([read(0), read(1), read(2), read(3)] as const);
};

export const render = (state: CornerState, scheme: ColorScheme = DEFAULT_COLOR_SCHEME): RenderedState => {
  assertStateShape(state);
  const faces: Record<FaceName, (ColorLabel | undefined)[]> = {
    top: new Array<ColorLabel | undefined>(FACE_CELL_COUNT),
    left: new Array<ColorLabel | undefined>(FACE_CELL_COUNT),
    back: new Array<ColorLabel | undefined>(FACE_CELL_COUNT),
    front: new Array<ColorLabel | undefined>(FACE_CELL_COUNT),
    right: new Array<ColorLabel | undefined>(FACE_CELL_COUNT),
    bottom: new Array<ColorLabel | undefined>(FACE_CELL_COUNT),
  };

  SLOT_PLACEMENTS.forEach((placement, slot) => {
    const corner = readSlot(state.cornerPos, slot);
    const colors = rotateCornerColors(readSlot(scheme.corners, corner), readSlot(state.cornerOrt, slot));
    placement.forEach((sticker, index) => {
      faces[sticker.face][sticker.cell] = readSlot(colors, index);
    });
  });

  return Object.freeze({
    top: toFaceCells('top', faces.top),
    left: toFaceCells('left', faces.left),
    back: toFaceCells('back', faces.back),
    front: toFaceCells('front', faces.front),
    right: toFaceCells('right', faces.right),
    bottom: toFaceCells('bottom', faces.bottom),
  });
};

/**
 * Unfolded net: top above, then left/front/right/back side by side, bottom
 * below. Each face prints cells 0-1 on its first row and 2-3 on its second.
 */
export const formatRenderedState = (rendered: RenderedState): string => {
  const pair = (face: FaceName, row: 0 | 1): string => {
    const cells = rendered[face];
    return `${readSlot(cells, row * 2)}${readSlot(cells, row * 2 + 1)}`;
  };
  const band = (row: 0 | 1): string =>
    [pair('left', row), pair('front', row), pair('right', row), pair('back', row)].join(' ');

  return [
    `   ${pair('top', 0)}`,
    `   ${pair('top', 1)}`,
    band(0),
    band(1),
    `   ${pair('bottom', 0)}`,
    `   ${pair('bottom', 1)}`,
  ].join('\n');
};
