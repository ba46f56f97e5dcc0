import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';

// .env fills in what the process environment leaves unset; .env.local then
// overrides both.
export function loadEnvFiles(dir: string = process.cwd()): string[] {
  const loaded: string[] = [];
  const base = path.join(dir, '.env');
  if (fs.existsSync(base)) {
    dotenv.config({ path: base });
    loaded.push(base);
  }
  const local = path.join(dir, '.env.local');
  if (fs.existsSync(local)) {
    dotenv.config({ path: local, override: true });
    loaded.push(local);
  }
  return loaded;
}
