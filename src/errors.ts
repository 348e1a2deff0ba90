export class GatewayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A route or ignored-path pattern that the path matcher refuses to compile. */
export class PatternError extends GatewayError {
  constructor(
    readonly pattern: string,
    reason: string
  ) {
    super(`Malformed path pattern "${pattern}": ${reason}`);
  }
}

/** The backing route source could not produce its routes. */
export class RouteSourceError extends GatewayError {}

export class ConfigError extends GatewayError {
  constructor(readonly issues: string[]) {
    super(`Invalid gateway configuration: ${issues.join('; ')}`);
  }
}
