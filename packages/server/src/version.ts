/**
 * Service version, reported by /health and the CLI.
 */
export const SERVICE_VERSION = process.env.SERVICE_VERSION ?? '1.0.0';
