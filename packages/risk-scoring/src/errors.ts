export class AdminAuthorizationError extends Error {
  public constructor(public readonly caller: string) {
    super(`Caller ${caller || "<anonymous>"} is not the configured administrator`);
    this.name = "AdminAuthorizationError";
  }
}

export class InvalidInputError extends Error {
  public constructor(public readonly field: string, reason: string) {
    super(`Invalid value for ${field}: ${reason}`);
    this.name = "InvalidInputError";
  }
}

export class CounterOverflowError extends Error {
  public constructor(public readonly address: string, public readonly counter: string) {
    super(`Counter ${counter} for ${address} exceeds its representable range`);
    this.name = "CounterOverflowError";
  }
}

export class OracleResponseError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "OracleResponseError";
  }
}

export class OracleTimeoutError extends Error {
  public constructor(public readonly maxWaitMs: number) {
    super(`Oracle assessment timed out after ${maxWaitMs}ms`);
    this.name = "OracleTimeoutError";
  }
}
