import { DataSource } from 'typeorm';
import { Staff } from '../entities/Staff';
import { StoreUnavailableError } from '../errors';
import { StaffRecord, StaffSubmission } from '../types';
import { parseStaffSubmission } from '../validation/staff';

export interface StaffReader {
  listAll(): Promise<StaffRecord[]>;
}

/**
 * Append-only register of staff compensation records.
 *
 * There is deliberately no update or delete: a mistake is corrected by
 * adding a new record.
 */
export class StaffStore implements StaffReader {
  constructor(private readonly dataSource: DataSource) {}

  /** Opens the connection if needed and creates the staff table when absent. Safe to repeat. */
  async initialize(): Promise<void> {
    try {
      if (!this.dataSource.isInitialized) {
        await this.dataSource.initialize();
        console.log('DB initialized');
      }
      await this.dataSource.runMigrations({ transaction: 'all' });
    } catch (err) {
      throw new StoreUnavailableError('open the staff table', err);
    }
  }

  /**
   * Validates the submission and appends one row.
   * @returns the id assigned to the new record
   */
  async addStaff(submission: StaffSubmission): Promise<number> {
    const input = parseStaffSubmission(submission);
    try {
      const saved = await this.dataSource.transaction((manager) =>
        manager.save(manager.create(Staff, { ...input }))
      );
      return saved.id;
    } catch (err) {
      throw new StoreUnavailableError('add a staff record', err);
    }
  }

  // Ordered by id so that callers sorting stably keep insertion order on ties.
  async listAll(): Promise<StaffRecord[]> {
    try {
      const rows = await this.dataSource.getRepository(Staff).find({ order: { id: 'ASC' } });
      return rows.map(toRecord);
    } catch (err) {
      throw new StoreUnavailableError('read staff records', err);
    }
  }

  async count(): Promise<number> {
    try {
      return await this.dataSource.getRepository(Staff).count();
    } catch (err) {
      throw new StoreUnavailableError('count staff records', err);
    }
  }

  async close(): Promise<void> {
    if (this.dataSource.isInitialized) {
      await this.dataSource.destroy();
    }
  }
}

function toRecord(row: Staff): StaffRecord {
  return {
    id: row.id,
    name: row.name,
    role: row.role,
    basic: Number(row.basic),
    housing: Number(row.housing),
    transport: Number(row.transport),
    feeding: Number(row.feeding),
    createdAt: row.createdAt,
  };
}
