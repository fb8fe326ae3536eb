import fs from 'fs/promises';
import path from 'path';

function unquote(value: string): string {
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Applies `KEY=value` lines from a dotenv file to `env`. Variables that are
 * already set win over the file. Returns the keys that were applied.
 */
export async function loadDotEnv(
  envPath: string = path.join(process.cwd(), '.env'),
  env: NodeJS.ProcessEnv = process.env
): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(envPath, 'utf-8');
  } catch {
    return [];
  }

  const applied: string[] = [];
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }
    const withoutExport = trimmed.startsWith('export ') ? trimmed.slice(7).trim() : trimmed;
    const idx = withoutExport.indexOf('=');
    if (idx <= 0) {
      continue;
    }
    const key = withoutExport.slice(0, idx).trim();
    const value = unquote(withoutExport.slice(idx + 1).trim());
    if (env[key] === undefined || env[key] === '') {
      env[key] = value;
      applied.push(key);
    }
  }
  return applied;
}
