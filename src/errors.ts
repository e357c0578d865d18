export class PipewrightError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Thrown synchronously by constructors given an invalid combination of options. */
export class ValidationError extends PipewrightError {}

/** The entry module could not be found or loaded, or exported nothing usable. */
export class DiscoveryError extends PipewrightError {}

export function formatError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
