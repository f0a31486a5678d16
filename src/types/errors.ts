/**
 * Error types raised by slot vectors.
 *
 * Two classes of failure:
 * - ContractViolationError: a broken precondition (programmer error).
 *   Never caught inside the library and not meant for flow control.
 * - OutOfRangeError: the recoverable failure of checked element access.
 */

/**
 * Identifiers of the preconditions a vector checks.
 */
export type ContractId =
  | 'valid-count'
  | 'index-in-bounds'
  | 'not-empty'
  | 'iterator-in-range';

/**
 * Error thrown when a contract is violated.
 */
export class ContractViolationError extends Error {
  readonly contractId: ContractId;
  readonly context: Readonly<Record<string, unknown>>;

  constructor(
    contractId: ContractId,
    message: string,
    context: Record<string, unknown> = {}
  ) {
    super(`Contract "${contractId}" violated: ${message}`);
    this.name = 'ContractViolationError';
    this.contractId = contractId;
    this.context = Object.freeze({ ...context });
  }
}

/**
 * Error thrown by checked access when `index >= size`.
 */
export class OutOfRangeError extends RangeError {
  readonly index: number;
  readonly size: number;

  constructor(index: number, size: number) {
    super(`index ${index} out of range for size ${size}`);
    this.name = 'OutOfRangeError';
    this.index = index;
    this.size = size;
  }
}

/**
 * Assert a condition is true, throwing ContractViolationError if not.
 */
export function assertContract(
  condition: boolean,
  contractId: ContractId,
  message: string,
  context?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    throw new ContractViolationError(contractId, message, context);
  }
}

/**
 * Check if a value is a valid element count or capacity
 * (non-negative safe integer).
 */
export function isValidCount(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}
