/**
 * elastic-list - Errors
 */

import { LOG_PREFIX } from "./constants";

/**
 * Raised for programmer misuse: a second content view on a decoration,
 * enabling the update header below other headers, switching the load
 * action mid-load, or invalid controller options.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(`${LOG_PREFIX} ${message}`);
    this.name = "ConfigurationError";
  }
}

/** Type guard for configuration errors */
export const isConfigurationError = (
  error: unknown,
): error is ConfigurationError => error instanceof ConfigurationError;
