import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'node:fs';
import path from 'node:path';

const loaded = new Set<string>();

/**
 * Load `.env` then `.env.local` from the project root (later files win), plus
 * the file named by TAPEARCHIVE_ENV_FILE when set. Each file loads once.
 */
export function loadEnvFiles(projectRoot: string): string[] {
  const candidates = filterUnique(
    ['.env', '.env.local', process.env.TAPEARCHIVE_ENV_FILE].filter(
      (value): value is string => Boolean(value)
    )
  );

  const applied: string[] = [];
  candidates.forEach((candidate) => {
    const fullPath = path.isAbsolute(candidate) ? candidate : path.join(projectRoot, candidate);
    if (!existsSync(fullPath) || loaded.has(fullPath)) {
      return;
    }
    dotenvConfig({ path: fullPath, override: true });
    loaded.add(fullPath);
    applied.push(fullPath);
  });
  return applied;
}

function filterUnique(values: string[]): string[] {
  return values.filter((value, index) => values.indexOf(value) === index);
}
