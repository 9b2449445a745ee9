/**
 * The store answered, but with data the service cannot trust: a row that
 * vanished between insert and read-back, or a sentiment outside the enum.
 */
export class ReviewStoreIntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReviewStoreIntegrityError';
  }
}
