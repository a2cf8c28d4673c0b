/**
 * Utility Functions
 */

/**
 * Get environment variable with default value
 */
export function getEnv(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}
