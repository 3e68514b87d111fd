import fs from 'node:fs';
import path from 'node:path';

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

export function saveText(dir: string, fileName: string, text: string): string {
  ensureDir(dir);
  const target = path.join(dir, fileName);
  fs.writeFileSync(target, text.endsWith('\n') ? text : `${text}\n`, 'utf-8');
  return target;
}

export function saveJSON(dir: string, name: string, obj: unknown): string {
  return saveText(dir, `${name}.json`, JSON.stringify(obj, null, 2));
}
