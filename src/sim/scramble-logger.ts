import type { ActionToken, CornerState } from '../kernel/index.js';

// ---------------------------------------------------------------------------
// Log entry shapes
// ---------------------------------------------------------------------------

export interface ScrambleStartedLogEntry {
  readonly seed: number;
  readonly depth: number;
}

export interface ScrambleStepLogEntry {
  readonly index: number;
  readonly token: ActionToken;
  readonly state: CornerState;
}

export interface ScrambleFinishedLogEntry {
  readonly seed: number;
  readonly tokens: readonly ActionToken[];
  readonly stateHash: bigint;
  readonly solved: boolean;
}

// ---------------------------------------------------------------------------
// Console abstraction (for testing)
// ---------------------------------------------------------------------------

export interface LoggerConsole {
  group(...args: unknown[]): void;
  groupEnd(): void;
  log(...args: unknown[]): void;
  table(data: unknown): void;
}

export interface ScrambleLogger {
  readonly enabled: boolean;
  setEnabled(enabled: boolean): void;
  logScrambleStarted(entry: ScrambleStartedLogEntry): void;
  logStep(entry: ScrambleStepLogEntry): void;
  logScrambleFinished(entry: ScrambleFinishedLogEntry): void;
  logWarning(message: string): void;
}

export const formatStateSummary = (state: CornerState): string =>
  `pos=${state.cornerPos.join('')} ort=${state.cornerOrt.join('')}`;

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface CreateScrambleLoggerOptions {
  readonly console?: LoggerConsole;
  readonly enabled?: boolean;
}

export function createScrambleLogger(options?: CreateScrambleLoggerOptions): ScrambleLogger {
  const cons: LoggerConsole = options?.console ?? globalThis.console;
  let enabled = options?.enabled ?? false;

  return {
    get enabled(): boolean {
      return enabled;
    },

    setEnabled(value: boolean): void {
      enabled = value;
    },

    logScrambleStarted(entry: ScrambleStartedLogEntry): void {
      if (!enabled) return;
      cons.group(`[Scramble] seed=${entry.seed} depth=${entry.depth}`);
    },

    logStep(entry: ScrambleStepLogEntry): void {
      if (!enabled) return;
      cons.log(`[ScrambleStep] #${entry.index} ${entry.token} ${formatStateSummary(entry.state)}`);
    },

    logScrambleFinished(entry: ScrambleFinishedLogEntry): void {
      if (!enabled) return;
      cons.log(
        `[ScrambleDone] seed=${entry.seed} moves=${entry.tokens.length} hash=0x${entry.stateHash.toString(16)} solved=${entry.solved}`,
      );
      cons.table(entry.tokens.map((token, step) => ({ step, token })));
      cons.groupEnd();
    },

    logWarning(message: string): void {
      if (!enabled) return;
      cons.log(`[ScrambleWarn] ${message}`);
    },
  };
}
