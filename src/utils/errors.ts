/**
 * @fileoverview Error types raised by the colony and its reference policies.
 *
 * @module utils/errors
 */

/**
 * Raised when the colony or a policy is constructed or called with
 * arguments outside their accepted range.
 */
export class ColonyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ColonyError";
  }
}

/**
 * Raised when a collaborator breaks its contract: a visit score that is
 * NaN, a deposit that is not a finite non-negative number, or a move to a
 * node that was never offered.
 */
export class PolicyContractError extends Error {
  /** The offending value, when one exists */
  readonly value: number | undefined;

  constructor(message: string, value?: number) {
    super(message);
    this.name = "PolicyContractError";
    this.value = value;
  }
}
