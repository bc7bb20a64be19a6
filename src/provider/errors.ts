export type RejectionKind = "invalid_request" | "rate_limited";

export class ProviderRequestRejected extends Error {
  override readonly name = "ProviderRequestRejected";

  constructor(
    message: string,
    readonly kind: RejectionKind,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}
