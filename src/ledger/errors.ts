export class PersistenceError extends Error {
  override readonly name = "PersistenceError";

  constructor(
    message: string,
    readonly filePath: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}
