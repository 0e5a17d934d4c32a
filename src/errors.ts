export class UnsupportedFeatureError extends Error {
  override readonly name: string = 'UnsupportedFeatureError';

  constructor(
    readonly feature: string,
    message?: string,
  ) {
    super(message ?? `${feature} is not supported by the MongoDB adapter`);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class MalformedInputError extends Error {
  override readonly name: string = 'MalformedInputError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidIdentifierError extends MalformedInputError {
  override readonly name: string = 'InvalidIdentifierError';

  constructor(
    readonly input: string | number | bigint,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class IdentifierTypeError extends TypeError {
  override readonly name: string = 'IdentifierTypeError';

  constructor(readonly received: string) {
    super(`Identifier argument must be an ObjectId, a string or a non-negative integer, got ${received}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UpdateError extends Error {
  override readonly name: string = 'UpdateError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends Error {
  override readonly name: string = 'ConfigurationError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
