export class RandomError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RandomError';
  }
}

export class InvalidArgumentError extends RandomError {
  readonly argument: string;
  readonly value: unknown;

  constructor(argument: string, value: unknown, message: string) {
    super(`Invalid ${argument} (${String(value)}): ${message}`);
    this.name = 'InvalidArgumentError';
    this.argument = argument;
    this.value = value;
  }
}
