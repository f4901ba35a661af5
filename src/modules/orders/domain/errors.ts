export class BookCompletionError extends Error {
  constructor(
    message: string,
    readonly attempts: number,
  ) {
    super(message);
    this.name = 'BookCompletionError';
  }
}

export class OrderNotFoundError extends Error {
  constructor(readonly orderId: string) {
    super(`Order ${orderId} not found`);
    this.name = 'OrderNotFoundError';
  }
}

/** The order moved to a state (refunded, for example) where the book must not be delivered. */
export class OrderNotProcessableError extends Error {
  constructor(
    readonly orderId: string,
    readonly status: string,
  ) {
    super(`Order ${orderId} is ${status}; book completion stopped`);
    this.name = 'OrderNotProcessableError';
  }
}
