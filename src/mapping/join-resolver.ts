/**
 * Cross-reference joins.
 *
 * The outer half is a nested node looping over source repetitions and
 * binding an outer key (`refDG13: buildIdentifierFromCwe, DG1.3`). The
 * inner half is a node with `specs: $Condition` whose own vars compute a key
 * per candidate and whose condition compares the two:
 *
 *   condition: $refconditionId EQUALS_STRING $refDG13
 *   specs: $Condition
 *   vars:
 *     refconditionId: $BASE_VALUE, extractAttribute(refconditionId, "...", "STRING")
 *
 * Candidates are scanned in list order; the first match wins unless the
 * node asks for a list. The scan is O(N·M) across the outer loop.
 */

import { evaluateCondition, type Condition } from "./condition";
import type { Scope } from "./scope";
import type { BoundValue } from "./values";

export interface JoinRequest {
  candidates: readonly BoundValue[];
  /** Scope for one candidate with the node's vars bound over it. */
  bindCandidate: (candidate: BoundValue) => Scope;
  match: Condition;
  firstOnly: boolean;
}

/** Scopes of the matching candidates, in candidate order. Empty when none match. */
export function resolveJoin({ candidates, bindCandidate, match, firstOnly }: JoinRequest): Scope[] {
  const matches: Scope[] = [];

  for (const candidate of candidates) {
    const scope = bindCandidate(candidate);
    if (!evaluateCondition(match, (name) => scope.lookup(name))) continue;

    matches.push(scope);
    if (firstOnly) break;
  }

  return matches;
}
