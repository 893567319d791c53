/**
 * Utility functions for safe logging that prevents accidental exposure of secrets
 *
 * Never log utterances, configuration values or environment secrets.
 * Only log explicitly whitelisted, known-safe values.
 */

/**
 * Safely log environment info without exposing secrets
 * Only logs explicitly whitelisted, non-sensitive environment variables
 */
export function logSafeEnvironmentInfo() {
  const safeEnvVars = {
    NODE_ENV: process.env.NODE_ENV,
    PATCHBOT_API_PORT: process.env.PATCHBOT_API_PORT,
    PATCHBOT_API_HOST: process.env.PATCHBOT_API_HOST,
    PATCHBOT_MODEL_NAME: process.env.PATCHBOT_MODEL_NAME,
    PATCHBOT_STORE_BACKEND: process.env.PATCHBOT_STORE_BACKEND,
  };

  console.log("[environment] Safe environment variables:", safeEnvVars);
}

/**
 * Safely log that a secret/token was found without exposing its value
 * @param secretName - Name of the secret (e.g., "PATCHBOT_API_KEY")
 */
export function logSecretStatus(secretName: string, value: string | undefined) {
  if (value) {
    console.log(`[security] ${secretName}: ✓ loaded (${value.length} chars)`);
  } else {
    console.warn(`[security] ${secretName}: ✗ not found`);
  }
}

/**
 * Log application events with only safe, known values
 * Use this for logging application state, not user input or external data
 * @param component - Component name (e.g., "web-api", "model-readiness")
 * @param event - Event name (e.g., "started", "error", "request-received")
 * @param details - Only log known-safe details (numbers, booleans, predefined strings)
 */
export function logApplicationEvent(component: string, event: string, details?: Record<string, string | number | boolean>) {
  const logEntry = {
    component,
    event,
    timestamp: new Date().toISOString(),
    ...details
  };
  console.log(`[${component}] ${event}`, logEntry);
}

/**
 * Log API requests safely without exposing sensitive data
 * @param path - Request path (sanitized)
 * @param duration - Request duration in ms
 */
export function logApiRequest(method: string, path: string, statusCode: number, duration: number) {
  // Only log the path structure, not query parameters or service names
  const safePath = path.split("?")[0].replace(/^(\/api\/(?:schemas|values))\/[^/]+/, "$1/{service}");
  console.log(`[api] ${method} ${safePath} ${statusCode} ${Math.round(duration)}ms`);
}
