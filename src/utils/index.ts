/**
 * @fileoverview Utilities module exports.
 *
 * @module utils
 */

export { ErrorMapper } from "./ErrorMapper";
export { ColonyError, PolicyContractError } from "./errors";
