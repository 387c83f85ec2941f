import type { Address } from './records.js';

export type InputField = 'description' | 'urgency' | 'offset';

/** Tagged result shared by every mutating registry operation */
export type OperationResult =
  | { readonly type: 'success'; readonly message: string }
  | { readonly type: 'not-found'; readonly address: Address }
  | { readonly type: 'already-exists'; readonly address: Address }
  | { readonly type: 'invalid-input'; readonly field: InputField; readonly message: string };

export type OperationFailure = Exclude<OperationResult, { type: 'success' }>;

export const FailureKind = {
  NotFound: 'NotFound',
  AlreadyExists: 'AlreadyExists',
  InvalidInput: 'InvalidInput',
} as const;

export type FailureKind = (typeof FailureKind)[keyof typeof FailureKind];

export function isSuccess(r: OperationResult): r is { type: 'success'; message: string } {
  return r.type === 'success';
}

export function isFailure(r: OperationResult): r is OperationFailure {
  return r.type !== 'success';
}

/** Failure kind of a result, or null on success */
export function failureKind(r: OperationResult): FailureKind | null {
  switch (r.type) {
    case 'success': return null;
    case 'not-found': return FailureKind.NotFound;
    case 'already-exists': return FailureKind.AlreadyExists;
    case 'invalid-input': return FailureKind.InvalidInput;
  }
}
