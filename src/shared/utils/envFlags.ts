// Shared helpers for reading environment flags. Keeping this logic
// centralised ensures config and logging agree on what "test" means.

type ProcessEnv = Record<string, string | undefined>;

export function readEnv(name: string, env: ProcessEnv = process.env): string | undefined {
  const value = env[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Returns true if running inside a Jest worker process.
 * This is useful for detecting test runtime even when NODE_ENV might be
 * configured differently (e.g., NODE_ENV=development in a .env file).
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}
