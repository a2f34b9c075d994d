export class TransactionNotFoundError extends Error {
  constructor(public readonly transactionId: string) {
    super(`Transaction not found: ${transactionId}`);
    this.name = 'TransactionNotFoundError';
  }
}
