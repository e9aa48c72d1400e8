/**
 * Raised when registry.json cannot be read or has the wrong shape
 */
export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryError";
  }
}

/**
 * Raised when user input fails a rule. Shown inline in the input's error slot.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

// Custom error for clean exit propagation out of the settings controller
export class QuitRequestedError extends Error {
  constructor() {
    super("Quit requested");
    this.name = "QuitRequestedError";
  }
}

export function requestQuit(): never {
  throw new QuitRequestedError();
}

/**
 * Coerce an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === "string" ? value : String(value));
}

/**
 * Prefix an error's message while keeping it as the cause
 */
export function wrapError(prefix: string, cause: unknown): Error {
  const error = toError(cause);
  return new Error(`${prefix}: ${error.message}`, { cause: error });
}
