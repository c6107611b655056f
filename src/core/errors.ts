/**
 * Base class for failures that stop a layout from being produced.
 * Geometry problems that can be clamped are diagnostics, not errors.
 */
export abstract class LayoutError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = this.constructor.name;

    // Keep instanceof working for subclasses
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The caller supplied input no chart can be laid out from
 * (an empty series, or a config object that fails validation).
 */
export class ConfigurationError extends LayoutError {
  constructor(message: string, code = 'PIE-CONFIG-INVALID', hint?: string) {
    super(message, code, hint);
  }
}

export function isLayoutError(error: unknown): error is LayoutError {
  return error instanceof LayoutError;
}
