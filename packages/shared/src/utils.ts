import * as fs from 'node:fs';
import * as path from 'node:path';

export function mkdirSafe(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Write through a sibling `.partial` file and rename, so readers of exported
 * artifacts never see a half-written document.
 */
export function writeFileAtomic(filePath: string, data: string): void {
  const dir = path.dirname(filePath);
  mkdirSafe(dir);
  const tmp = path.join(dir, `.${path.basename(filePath)}.partial`);
  fs.writeFileSync(tmp, data, 'utf-8');
  fs.renameSync(tmp, filePath);
}
