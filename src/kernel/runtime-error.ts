import type { Diagnostic } from './diagnostics.js';

export type KernelRuntimeErrorCode =
  | 'INVALID_STATE'
  | 'INVALID_ACTION'
  | 'INVALID_ENCODED_FEATURE';

export interface KernelRuntimeErrorContextByCode {
  readonly INVALID_STATE: Readonly<{
    readonly diagnostics: readonly Diagnostic[];
  }>;
  readonly INVALID_ACTION: Readonly<{
    readonly action: string;
  }>;
  readonly INVALID_ENCODED_FEATURE: Readonly<{
    readonly diagnostics: readonly Diagnostic[];
  }>;
}

export type KernelRuntimeErrorContext<C extends KernelRuntimeErrorCode = KernelRuntimeErrorCode> =
  KernelRuntimeErrorContextByCode[C];

function formatMessage<C extends KernelRuntimeErrorCode>(message: string, context?: KernelRuntimeErrorContext<C>): string {
  if (context === undefined) {
    return message;
  }
  return `${message} context=${JSON.stringify(context)}`;
}

export class KernelRuntimeError<C extends KernelRuntimeErrorCode = KernelRuntimeErrorCode> extends Error {
  readonly code: C;
  readonly context?: KernelRuntimeErrorContext<C>;

  constructor(code: C, message: string, context?: KernelRuntimeErrorContext<C>, cause?: unknown) {
    super(formatMessage(message, context), cause === undefined ? undefined : { cause });
    this.name = 'KernelRuntimeError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
  }
}

export const kernelRuntimeError = <C extends KernelRuntimeErrorCode>(
  code: C,
  message: string,
  context?: KernelRuntimeErrorContext<C>,
  cause?: unknown,
): KernelRuntimeError<C> => new KernelRuntimeError(code, message, context, cause);

export const invalidStateError = (
  message: string,
  diagnostics: readonly Diagnostic[],
): KernelRuntimeError<'INVALID_STATE'> => new KernelRuntimeError('INVALID_STATE', message, { diagnostics });

export const invalidActionError = (action: unknown): KernelRuntimeError<'INVALID_ACTION'> =>
  new KernelRuntimeError('INVALID_ACTION', `Unknown corner action: ${String(action)}`, { action: String(action) });

export function isKernelRuntimeError(error: unknown): error is KernelRuntimeError {
  return error instanceof KernelRuntimeError;
}

export function isKernelErrorCode<C extends KernelRuntimeErrorCode>(
  error: unknown,
  code: C,
): error is KernelRuntimeError<C> {
  return isKernelRuntimeError(error) && error.code === code;
}
