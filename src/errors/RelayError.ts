export class RelayError extends Error {
  public readonly code: string;
  public readonly id?: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: {
      code?: string;
      id?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = this.constructor.name;
    this.code = options?.code || "RELAY_ERROR";
    this.id = options?.id;
    this.details = options?.details;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.id ? { id: this.id } : {}),
      ...(this.details ? { details: this.details } : {}),
      ...(this.cause ? { cause: serializeError(this.cause) } : {}),
    };
  }
}

/**
 * A caller or collaborator broke the data contract: an unknown message variant,
 * a tool call of a shape this core cannot represent, a prompt of the wrong kind.
 * Never recovered.
 */
export class ContractViolationError extends RelayError {
  constructor(message: string, options?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, { ...options, code: "CONTRACT_VIOLATION" });
  }
}

/**
 * No per-message token accounting convention is known for the model family.
 * Only token counting fails with this; generation does not.
 */
export class UnsupportedModelError extends RelayError {
  public readonly model: string;

  constructor(model: string) {
    super(
      `Token counting from messages is not implemented for model ${model}. ` +
        "See https://platform.openai.com/docs/advanced-usage/managing-tokens for how messages are converted to tokens.",
      { code: "UNSUPPORTED_MODEL", details: { model } },
    );
    this.model = model;
  }
}

/** A request the remote service would reject, detected before dispatch. */
export class InvalidRequestError extends RelayError {
  constructor(message: string, options?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, { ...options, code: "INVALID_REQUEST" });
  }
}

export class ConfigurationError extends RelayError {
  constructor(message: string, options?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, { ...options, code: "CONFIGURATION_ERROR" });
  }
}

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      ...(error.stack ? { stack: error.stack } : {}),
      ...("cause" in error && error.cause ? { cause: serializeError(error.cause) } : {}),
    };
  }
  return error;
}
