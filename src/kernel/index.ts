export * from './action-notation.js';
export * from './actions.js';
export * from './apply-move.js';
export * from './color-scheme-loader.js';
export * from './color-scheme.js';
export * from './diagnostics.js';
export * from './encode.js';
export * from './move-tables.js';
export * from './prng.js';
export * from './puzzle.js';
export * from './render.js';
export * from './runtime-error.js';
export * from './schemas.js';
export * from './state.js';
export * from './types.js';
export * from './validate-state.js';
export * from './zobrist.js';
