/**
 * Package version reported by the CLI and the gateway health endpoint.
 * Kept in step with package.json.
 */

export const VERSION = '0.1.0';
