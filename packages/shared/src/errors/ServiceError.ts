export interface ServiceErrorOptions {
  /** When false, clients see `publicMessage` instead of `message`. */
  expose?: boolean;
  publicMessage?: string;
  cause?: unknown;
}

/**
 * Base class for failures a service maps onto an HTTP status and a stable
 * error code in the `{ success: false, error: { code, message } }` envelope.
 */
export class ServiceError extends Error {
  readonly code: string;
  readonly status: number;
  readonly expose: boolean;
  private readonly publicMessage?: string;

  constructor(code: string, status: number, message: string, options: ServiceErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.expose = options.expose ?? status < 500;
    this.publicMessage = options.publicMessage;
  }

  get clientMessage(): string {
    if (this.expose) return this.message;
    return this.publicMessage ?? 'Internal server error';
  }
}

export const isServiceError = (err: unknown): err is ServiceError => err instanceof ServiceError;
