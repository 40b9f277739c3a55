// ──────────────────────────────────────────
// Script: Seed — write 90 days of demo exports into the first data directory
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import fs from 'fs/promises';
import path from 'path';
import dayjs from 'dayjs';
import { loadConfig } from '../src/config';
import { generateSampleFiles } from './sample-data';

async function seed() {
  const config = loadConfig();
  const dir = path.resolve(config.DATA_DIRS[0]);
  console.log(`[Seed] Writing sample exports to ${dir}`);

  await fs.mkdir(dir, { recursive: true });
  const files = generateSampleFiles({ days: 90, endDate: dayjs().subtract(1, 'day').format('YYYY-MM-DD') });
  for (const file of files) {
    await fs.writeFile(path.join(dir, file.name), `${file.content}\n`, 'utf-8');
    console.log(`[Seed] Wrote ${file.name}`);
  }

  console.log('[Seed] Done');
}

seed().catch((err) => {
  console.error('[Seed] Failed:', err);
  process.exit(1);
});
