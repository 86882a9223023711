import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

/**
 * Load .env from the working directory or its parent so env vars are available
 * whether the server is started from the repo root or from a subdirectory.
 */
export function loadEnv(): void {
  const cwd = process.cwd();
  const candidates = [
    path.join(cwd, '.env'),
    path.join(cwd, '..', '.env'),
  ];

  for (const envPath of candidates) {
    if (fs.existsSync(envPath)) {
      const result = dotenv.config({ path: envPath });
      if (result.error && process.env.NODE_ENV === 'development') {
        console.warn(`[env] Warning loading ${envPath}:`, result.error.message);
      }
      return;
    }
  }
}

/** Read an integer env var, falling back when unset or not a number. */
export function envInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}
