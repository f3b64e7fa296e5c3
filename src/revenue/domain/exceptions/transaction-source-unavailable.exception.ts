export class TransactionSourceUnavailableException extends Error {
  constructor(source: string, cause: string) {
    super(`Transaction source '${source}' is unavailable: ${cause}`);
    this.name = 'TransactionSourceUnavailableException';
  }
}
