import { DataSource } from 'typeorm';
import { DatabaseConfig } from './config';
import { Staff } from './entities/Staff';
import { CreateStaffTable1700000000000 } from './migrations/1700000000000-CreateStaffTable';

export function createDataSource(db: DatabaseConfig): DataSource {
  const shared = {
    entities: [Staff],
    migrations: [CreateStaffTable1700000000000],
    synchronize: false,
    logging: db.logging,
  };

  if (db.type === 'postgres') {
    return new DataSource({ type: 'postgres', url: db.url, ...shared });
  }
  // Without a location the register lives in memory only.
  return new DataSource({
    type: 'sqljs',
    location: db.location,
    autoSave: db.location !== undefined,
    ...shared,
  });
}
