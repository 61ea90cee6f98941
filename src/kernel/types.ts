export const SLOT_COUNT = 8;
export const ORIENTATION_COUNT = 3;

export type Orientation = 0 | 1 | 2;

/**
 * Corner-only cube state. `cornerPos[slot]` is the physical corner sitting in
 * `slot`; `cornerOrt[slot]` is that corner's twist relative to the slot.
 *
 * Slots: 0 TFL, 1 TFR, 2 TBR, 3 TBL, 4 DFL, 5 DFR, 6 DBR, 7 DBL.
 */
export interface CornerState {
  readonly cornerPos: readonly number[];
  readonly cornerOrt: readonly Orientation[];
}

export type GeneratorAction = 'R' | 'T' | 'B';
export type InverseAction = Lowercase<GeneratorAction>;
export type CornerAction = GeneratorAction | InverseAction;

export type ActionToken = `${'R' | 'U' | 'B'}${'+' | '-'}`;

export interface CycleStep {
  readonly from: number;
  readonly to: number;
}

export interface OrientationTwist {
  readonly slot: number;
  readonly delta: Orientation;
}

export interface MoveTable {
  readonly cycle: readonly CycleStep[];
  readonly twists: readonly OrientationTwist[];
}

export type FaceName = 'top' | 'left' | 'back' | 'front' | 'right' | 'bottom';

export type ColorLabel = string;

export type CornerColors = readonly [ColorLabel, ColorLabel, ColorLabel];

export interface ColorScheme {
  readonly id: string;
  readonly corners: readonly CornerColors[];
}

export interface StickerPlacement {
  readonly face: FaceName;
  readonly cell: number;
}

export type SlotPlacement = readonly [StickerPlacement, StickerPlacement, StickerPlacement];

export type FaceCells = readonly [ColorLabel, ColorLabel, ColorLabel, ColorLabel];

export type RenderedState = Readonly<Record<FaceName, FaceCells>>;

export type FeatureBit = 0 | 1;

export type EncodedFeature = readonly (readonly FeatureBit[])[];

export interface ZobristTable {
  readonly seed: bigint;
  readonly fingerprint: string;
}

export interface ZobristFeature {
  readonly slot: number;
  readonly corner: number;
  readonly orientation: Orientation;
}

export interface Rng {
  readonly lcg: bigint;
  readonly increment: bigint;
}

export interface PuzzleDefinition<TState, TAction, TRendered, TFeature> {
  readonly name: string;
  readonly initialState: TState;
  readonly isGoal: (state: TState) => boolean;
  readonly actions: readonly TAction[];
  readonly transform: (state: TState, action: TAction) => TState;
  readonly inverseAction: (action: TAction) => TAction;
  readonly render: (state: TState) => TRendered;
  readonly renderAction: (action: TAction) => string;
  readonly parseAction: (token: string) => TAction | null;
  readonly encodedShape: readonly [number, number];
  readonly encode: (state: TState) => TFeature;
}
