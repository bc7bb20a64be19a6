/**
 * Result of one admission + dispatch cycle. Unexpected failures (ledger
 * persistence, unclassified provider errors) are not outcomes: they reject
 * the dispatch promise and reach the error reporter.
 */
export type DispatchOutcome =
  | { readonly kind: "too_soon"; readonly retryAfterMs: number }
  | { readonly kind: "quota_exceeded"; readonly count: number }
  | { readonly kind: "prompt_required" }
  | { readonly kind: "blocked"; readonly prompt: string }
  | { readonly kind: "provider_error"; readonly message: string }
  | { readonly kind: "delivered"; readonly imageUrl: string; readonly prompt: string };

export type DispatchOutcomeKind = DispatchOutcome["kind"];
