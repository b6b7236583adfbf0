import { SpecificationError, type SpecificationLocation } from "./errors";
import type { ResourceInstance } from "./resource-instance";
import type { Scope } from "./scope";
import type { ExpressionNode } from "./specification";

/** Where a deferred result is spliced once it is produced. */
export interface DeferredTarget {
  instance: ResourceInstance;
  attribute: string;
  location: SpecificationLocation;
}

export interface DeferredEvaluation {
  sequence: number;
  node: ExpressionNode;
  /** Scope as it was when the node was reached in the first pass. */
  scope: Scope;
  target: DeferredTarget;
}

/**
 * Second-pass work for one run. Entries come out in enqueue order. The queue
 * drains once; enqueueing after that point means some deferred evaluation
 * asked to be deferred again, which a run never allows.
 */
export class DeferredQueue {
  private readonly entries: DeferredEvaluation[] = [];
  private draining = false;
  private sequence = 0;

  enqueue(node: ExpressionNode, scope: Scope, target: DeferredTarget): void {
    if (this.draining) {
      throw new SpecificationError(
        "Cyclic deferral: evaluateLater reached while draining deferred evaluations",
        target.location,
      );
    }
    this.entries.push({ sequence: this.sequence++, node, scope, target });
  }

  get size(): number {
    return this.entries.length;
  }

  /** @throws SpecificationError when called a second time */
  drain(evaluate: (entry: DeferredEvaluation) => void): void {
    if (this.draining) {
      throw new SpecificationError("Deferred evaluations were already drained for this run");
    }
    this.draining = true;

    for (const entry of this.entries.splice(0)) {
      evaluate(entry);
    }
  }
}
