/**
 * Environment variable access
 */
export function getEnv(key: string): string | undefined {
  return process.env[key];
}

/**
 * Gets environment variable or throws if missing
 * Useful for required configuration
 */
export function requireEnv(key: string): string {
  const value = getEnv(key);
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}
