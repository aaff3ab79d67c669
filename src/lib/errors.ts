export type ConfigSource = "profile" | "instance" | "server";

/**
 * Raised while building the application or the server settings. Entry points
 * let it propagate and exit before anything starts listening.
 */
export class ConfigResolutionError extends Error {
  readonly source: ConfigSource;

  constructor(source: ConfigSource, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigResolutionError";
    this.source = source;
  }
}
