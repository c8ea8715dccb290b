/** A payoff parameter lies outside its declared range. Thrown at construction only. */
export class ConstructionError extends Error {
  constructor(readonly parameter: string, readonly value: number, reason: string) {
    super(`Invalid ${parameter}=${value}: ${reason}`);
    this.name = 'ConstructionError';
  }
}

/** A pricing input violates a mathematical precondition (negative spot, vol, tenor...). */
export class DomainError extends Error {
  constructor(readonly parameter: string, readonly value: number, reason: string) {
    super(`Domain error at ${parameter}=${value}: ${reason}`);
    this.name = 'DomainError';
  }
}

/** Raised by ensureValid when a report carries a HALT; checks themselves never throw. */
export class ValidationHaltError extends Error {
  constructor(readonly messages: readonly string[]) {
    super(`Validation halted:\n${messages.map((m) => `  - ${m}`).join('\n')}`);
    this.name = 'ValidationHaltError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, readonly issues: readonly string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}
