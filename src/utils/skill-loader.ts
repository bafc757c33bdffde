import { fileURLToPath } from 'url';
import { resolve, dirname } from 'path';
import { readFileSync } from 'fs';

const __dirname = dirname(fileURLToPath(import.meta.url));
// tsx: src/utils/ → src/skills/ ; node dist/: dist/utils/ → dist/skills/ (copied by `npm run build`)
const skillsDir = resolve(__dirname, '../skills');

const cache = new Map<string, string>();

/** Read a prompt from `skills/<name>.md`, once per process. */
export function loadSkill(name: string): string {
  let text = cache.get(name);
  if (text === undefined) {
    text = readFileSync(resolve(skillsDir, `${name}.md`), 'utf-8');
    cache.set(name, text);
  }
  return text;
}
