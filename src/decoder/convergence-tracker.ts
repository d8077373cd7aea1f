// =============================================================================
// ConvergenceTracker — Monotonicity and final-consistency checks
// =============================================================================

import { ConvergenceViolationError, InvalidStateError } from "../errors.js";
import { collectLeaves, leafEquals, renderLeaf, type DecodedLeaf, type DecodedValue } from "./values.js";

/**
 * Watches the values one decode session emits. Every leaf a partial has
 * shown must still be there, unchanged, in each later partial and in the
 * final value. A violation is a decoder defect, never bad input.
 */
export class ConvergenceTracker {
  private previous: Map<string, DecodedLeaf> | undefined;
  private partials = 0;
  private finished = false;

  get partialCount(): number {
    return this.partials;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /** @throws ConvergenceViolationError when a previously resolved leaf was retracted or changed */
  observePartial(value: DecodedValue): void {
    if (this.finished) throw new InvalidStateError("finished", "Cannot observe a partial value after the final value");
    const leaves = collectLeaves(value);
    this.compare(leaves, "partial");
    this.previous = leaves;
    this.partials++;
  }

  /** @throws ConvergenceViolationError when the final value disagrees with the last partial */
  observeFinal(value: DecodedValue): void {
    if (this.finished) throw new InvalidStateError("finished", "The final value was already observed");
    this.compare(collectLeaves(value), "final");
    this.finished = true;
  }

  private compare(next: ReadonlyMap<string, DecodedLeaf>, label: "partial" | "final"): void {
    if (!this.previous) return;
    for (const [path, leaf] of this.previous) {
      const current = next.get(path);
      if (current === undefined) {
        throw new ConvergenceViolationError(path, `${label} value dropped ${renderLeaf(leaf)}`);
      }
      if (!leafEquals(leaf, current)) {
        throw new ConvergenceViolationError(path, `${label} value changed ${renderLeaf(leaf)} to ${renderLeaf(current)}`);
      }
    }
  }
}
