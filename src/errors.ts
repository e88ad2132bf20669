export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Homebox answered with a non-2xx status, or could not be reached at all (status 0). */
export class HomeboxRequestError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = "HomeboxRequestError";
  }
}

export class HomeboxResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HomeboxResponseError";
  }
}

export function errorMessage(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}
