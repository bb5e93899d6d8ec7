import * as fs from 'node:fs';
import * as path from 'node:path';
import { configTemplate, mkdirSafe, writeFileAtomic } from 'tessera-shared';
import { closeDb, getDb } from '../db/connection.js';
import { getRegistryVersion } from '../db/queries.js';
import { CONFIG_DIR, getFlagValue, getIntFlag } from '../config.js';
import { parseWindow } from './project.js';
import * as fmt from '../output/format.js';

export async function init(args: string[], isJson: boolean): Promise<void> {
  const projectRoot = process.cwd();
  const dir = path.join(projectRoot, CONFIG_DIR);
  const created: string[] = [];

  if (!isJson) fmt.header('Initializing tessera');

  mkdirSafe(dir);
  mkdirSafe(path.join(dir, 'artifacts'));

  const configPath = path.join(dir, 'config.json');
  const force = args.includes('--force');
  if (force || !fs.existsSync(configPath)) {
    writeFileAtomic(configPath, configTemplate({
      name: getFlagValue(args, '--name') ?? path.basename(projectRoot),
      corpusPath: getFlagValue(args, '--corpus') ?? 'data/corpus.csv',
      window: parseWindow(getFlagValue(args, '--window')),
      seed: getIntFlag(args, '--seed'),
    }));
    created.push(path.join(CONFIG_DIR, 'config.json'));
  }

  // Opening runs the migrations.
  const db = getDb(projectRoot);
  const registryVersion = getRegistryVersion(db);
  closeDb();
  created.push(path.join(CONFIG_DIR, 'tessera.db'));

  if (isJson) {
    fmt.json({ root: projectRoot, created, registryVersion });
    return;
  }
  for (const f of created) fmt.info(`Wrote ${f}`);
  fmt.success(`Initialized in ${projectRoot}. Next: \`tessera status\`.`);
}
