/** The store could not complete a read, lock or commit. Nothing was written. */
export class StoreUnavailableError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StoreUnavailableError';
  }
}

/** A transaction tried to write a row it did not lock. */
export class TransactionScopeError extends Error {
  constructor(entity: string, id: string) {
    super(`Write to ${entity}:${id} is outside the transaction scope`);
    this.name = 'TransactionScopeError';
  }
}
