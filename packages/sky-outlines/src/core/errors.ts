/**
 * Sky Outlines Error Types
 *
 * The only hard failure of the outline pipeline is a raster that breaks the
 * input contract. Everything else (loops that never close, gaps between
 * cells) degrades to warnings on the result.
 */

import type { EdgeKey } from './types.js';

/**
 * Ways a raster or its options can break the input contract
 */
export type InputContractReason =
  | 'label_count'
  | 'corner_count'
  | 'non_finite_corner'
  | 'non_manifold_side'
  | 'unmatched_side'
  | 'invalid_resolution'
  | 'invalid_config';

/**
 * Details about the contract violation
 */
export interface InputContractDetails {
  readonly reason: InputContractReason;
  /** Offending cell, when one cell is to blame */
  readonly cellId?: number;
  /** Offending side, for adjacency failures */
  readonly edge?: EdgeKey;
  /** Validation messages, for option failures */
  readonly issues?: readonly string[];
}

/**
 * Error thrown when the raster handed to the pipeline is malformed.
 *
 * @example
 * ```typescript
 * if (corners.length < 3) {
 *   throw new InputContractError(
 *     `Cell ${cellId} has ${corners.length} corners, need at least 3`,
 *     { reason: 'corner_count', cellId }
 *   );
 * }
 * ```
 */
export class InputContractError extends Error {
  public readonly name = 'InputContractError' as const;

  constructor(
    message: string,
    public readonly details: InputContractDetails
  ) {
    super(message);
    Object.setPrototypeOf(this, InputContractError.prototype);
  }

  get reason(): InputContractReason {
    return this.details.reason;
  }

  get cellId(): number | undefined {
    return this.details.cellId;
  }

  /**
   * Create a formatted error message for logging
   */
  toLogString(): string {
    const parts = [`InputContractError: ${this.message}`, `  Reason: ${this.reason}`];
    if (this.details.cellId !== undefined) {
      parts.push(`  Cell: ${this.details.cellId}`);
    }
    if (this.details.edge) {
      parts.push(`  Side: ${this.details.edge.lower}-${this.details.edge.higher}`);
    }
    for (const issue of this.details.issues ?? []) {
      parts.push(`  Issue: ${issue}`);
    }
    return parts.join('\n');
  }
}

/**
 * Type guard to check if an error is an InputContractError
 */
export function isInputContractError(error: unknown): error is InputContractError {
  return error instanceof InputContractError;
}
