export class EngineError extends Error {
  constructor(
    public code: string,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnreachableGoalError extends EngineError {
  constructor(message: string) {
    super('UNREACHABLE_GOAL', message);
  }
}

export class InvalidInputError extends EngineError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
  }
}
