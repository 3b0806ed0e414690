export class UdfAppError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Missing or malformed app environment.
export class ConfigError extends UdfAppError {}

export class GatewayNotEnabledError extends UdfAppError {
  constructor() {
    super('UDFs are not available if the gateway is not enabled');
  }
}

// A UDF declaration that cannot be exposed as an external function.
export class UdfDefinitionError extends UdfAppError {}

export class UdfNotFoundError extends UdfAppError {
  readonly functionName: string;

  constructor(functionName: string) {
    super(`Function '${functionName}' is not registered`);
    this.functionName = functionName;
  }
}

export class UdfArgumentError extends UdfAppError {}

export class UdfExecutionError extends UdfAppError {}

export class RegistrationError extends UdfAppError {}

// Rejects a request body before it reaches a function.
export class RequestError extends UdfAppError {
  readonly status: 400 | 413;

  constructor(message: string, status: 400 | 413 = 400) {
    super(message);
    this.status = status;
  }
}
