/**
 * Configuration utility functions
 */

/**
 * Type-safe environment variable getter with automatic type inference
 * @param name Environment variable name
 * @param defaultValue Default value (optional). If not provided, variable is required
 * @returns Environment variable value converted to the type of defaultValue, or defaultValue if variable not set
 * @throws {Error} if variable is required but not set, or if conversion fails
 */
export function env<T extends string | number | boolean>(
  name: string,
  defaultValue?: T,
): T {
  const value = process.env[name];

  if (value === undefined) {
    if (defaultValue === undefined) {
      throw new Error(`Required environment variable ${name} is not set`);
    }
    return defaultValue;
  }

  // Type-safe conversion based on default value type
  if (typeof defaultValue === "number") {
    const numValue = Number(value);
    if (value.trim() === "" || isNaN(numValue)) {
      throw new Error(`Environment variable ${name} must be a valid number, got: ${value}`);
    }
    return numValue as T;
  }

  if (typeof defaultValue === "boolean") {
    if (value === "true" || value === "1") {
      return true as T;
    }
    if (value === "false" || value === "0") {
      return false as T;
    }
    throw new Error(
      `Environment variable ${name} must be a valid boolean (true/false/1/0), got: ${value}`,
    );
  }

  return value as T;
}

/**
 * Optional number; unset stays undefined unless a default is given
 */
export function envNumberOptional(name: string, defaultValue?: number): number | undefined {
  const value = process.env[name];

  if (value === undefined) {
    return defaultValue;
  }

  const numValue = Number(value);
  if (value.trim() === "" || isNaN(numValue)) {
    throw new Error(`Environment variable ${name} must be a valid number, got: ${value}`);
  }

  return numValue;
}

/**
 * Optional string; unset or empty is undefined
 */
export function envStringOptional(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Converts configuration to JSON string without secrets
 * Masks API keys before the configuration is logged
 * @param config Configuration object
 * @returns JSON string with masked sensitive data
 */
export function toJSONWithoutPII<
  T extends {
    readonly agent: { readonly llm: { readonly apiKey: string } };
    readonly truenas: { readonly apiKey: string };
  },
>(config: T): string {
  const masked = {
    ...config,
    agent: {
      ...config.agent,
      llm: { ...config.agent.llm, apiKey: maskString(config.agent.llm.apiKey) },
    },
    truenas: { ...config.truenas, apiKey: maskString(config.truenas.apiKey) },
  };
  return JSON.stringify(masked, null, 2);
}

/**
 * Masks a string by showing first 4 and last 4 characters
 * @param str String to mask
 * @returns Masked string
 */
export function maskString(str: string): string {
  if (str.length <= 8) {
    return "*".repeat(str.length);
  }
  return `${str.slice(0, 4)}${"*".repeat(str.length - 8)}${str.slice(-4)}`;
}
