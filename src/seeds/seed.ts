import 'reflect-metadata';
import * as path from 'path';
import { promises as fs } from 'fs';
import { loadConfig, loadEnvFile } from '../config';
import { InvalidInputError } from '../errors';
import { createDataSource } from '../ormconfig';
import { StaffStore } from '../services/staffStore';
import { StaffSubmission } from '../types';

type SeedSchema = {
  staff?: StaffSubmission[];
};

export async function loadSeedFile(jsonPath = path.join(__dirname, 'data.json')): Promise<SeedSchema> {
  let raw: string;
  try {
    raw = await fs.readFile(jsonPath, 'utf8');
  } catch (err) {
    throw new Error(`No seed file found at ${jsonPath}`, { cause: err });
  }
  const parsed: unknown = JSON.parse(raw);
  if (!parsed || typeof parsed !== 'object' || !('staff' in parsed) || !Array.isArray(parsed.staff)) {
    throw new Error(`Seed file ${jsonPath} must contain a "staff" array`);
  }
  return { staff: parsed.staff };
}

export async function seedStaff(store: StaffStore, seed: SeedSchema) {
  let inserted = 0;
  let skipped = 0;
  for (const entry of seed.staff ?? []) {
    try {
      await store.addStaff(entry);
      inserted++;
    } catch (err) {
      if (!(err instanceof InvalidInputError)) throw err;
      console.warn(`Skipping seed entry: ${err.message}`);
      skipped++;
    }
  }
  return { inserted, skipped };
}

async function runSeed() {
  loadEnvFile();
  const store = new StaffStore(createDataSource(loadConfig().database));
  await store.initialize();
  console.log('DataSource initialized for seeding');

  try {
    const { inserted, skipped } = await seedStaff(store, await loadSeedFile());
    console.log(`Seeding complete. Staff inserted: ${inserted}, skipped: ${skipped}`);
  } finally {
    await store.close();
  }
}

if (require.main === module) {
  runSeed().catch(err => {
    console.error('Seed failed', err);
    process.exit(1);
  });
}
