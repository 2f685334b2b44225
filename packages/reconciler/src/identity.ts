/**
 * Break Identity
 *
 * A break's id is derived from its content, so re-running the same
 * reconciliation finds the same identity and the store can suppress it:
 *
 *   identityKey = sha256(canonicalize({ category, sourceRefs (sorted) }))
 *   id          = "brk_" + identityKey[0..32]
 *
 * Canonicalization is RFC 8785 (JCS), so key order never matters.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { BreakCategory, TradeRef } from "@tradebreak/types";

export const BREAK_ID_PREFIX = "brk_";

export interface BreakIdentity {
  readonly id: string;
  readonly identityKey: string;
}

/**
 * Sort refs by sourceId, then externalRef (code-point order).
 */
export function sortRefs(refs: readonly TradeRef[]): readonly TradeRef[] {
  return [...refs]
    .map((r) => ({ sourceId: r.sourceId, externalRef: r.externalRef }))
    .sort((x, y) => {
      if (x.sourceId !== y.sourceId) return x.sourceId < y.sourceId ? -1 : 1;
      if (x.externalRef !== y.externalRef) return x.externalRef < y.externalRef ? -1 : 1;
      return 0;
    });
}

export function computeBreakIdentity(
  category: BreakCategory,
  refs: readonly TradeRef[],
): BreakIdentity {
  const content = canonicalize({ category, sourceRefs: sortRefs(refs) });
  const identityKey = createHash("sha256").update(content).digest("hex");
  return { id: `${BREAK_ID_PREFIX}${identityKey.slice(0, 32)}`, identityKey };
}
