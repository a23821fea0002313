export class NotFoundError extends Error {
  constructor(what: string, id: string) {
    super(`${what} not found: ${id}`);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class LlmResponseError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'LlmResponseError';
  }
}

export class UsageLimitExceededError extends Error {
  constructor(readonly kind: string, readonly limit: number) {
    super(`usage limit reached for ${kind} (${limit})`);
    this.name = 'UsageLimitExceededError';
  }
}
