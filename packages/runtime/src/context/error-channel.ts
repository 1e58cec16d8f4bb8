/**
 * Per-context slot holding the last operational failure
 */

export const SOFT_FAILURE: unique symbol = Symbol("capbridge.softFailure");
export type SoftFailure = typeof SOFT_FAILURE;

export class ErrorChannel {
  private message: string | undefined;

  /**
   * Store a failure message, overwriting any previous one
   */
  set(message: string): SoftFailure {
    this.message = message;
    return SOFT_FAILURE;
  }

  /**
   * Last stored message; reading does not clear it
   */
  last(): string | undefined {
    return this.message;
  }
}

export function isSoftFailure(value: unknown): value is SoftFailure {
  return value === SOFT_FAILURE;
}
