import fs from 'fs';
import os from 'os';
import path from 'path';
import { Workbook } from 'exceljs';
import { EmptyExportError } from '../errors';
import { StaffRecord } from '../types';
import { PAYROLL_COLUMNS, computePayroll } from './payroll';
import { PayrollExportService } from './payrollExport';
import { StaffReader } from './staffStore';

const createdAt = new Date('2026-03-02T08:30:00Z');

const records: StaffRecord[] = [
  { id: 1, name: 'Amaka Obi', role: 'Accountant', basic: 20000, housing: 5000, transport: 3000, feeding: 2000, createdAt },
  { id: 2, name: 'Tunde Bello', role: 'Engineer', basic: 35000, housing: 8000, transport: 4000, feeding: 3000, createdAt },
];

const reader: StaffReader = { listAll: async () => records };

describe('PayrollExportService', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'payroll-export-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes a header row in view column order', async () => {
    const workbook = await new PayrollExportService(reader, path.join(dir, 'out.xlsx')).buildWorkbook();
    const sheet = workbook.worksheets[0];

    expect(sheet.name).toBe('Payroll');
    const header = PAYROLL_COLUMNS.map((_, i) => sheet.getRow(1).getCell(i + 1).value);
    expect(header).toEqual([
      'id', 'name', 'role', 'basic', 'housing', 'transport', 'feeding',
      'created_at', 'gross', 'tax', 'pension', 'net',
    ]);
  });

  it('has one row per staff record matching computePayroll', async () => {
    const workbook = await new PayrollExportService(reader, path.join(dir, 'out.xlsx')).buildWorkbook();
    const sheet = workbook.worksheets[0];
    const lines = await computePayroll(reader);

    expect(sheet.rowCount).toBe(1 + records.length);
    lines.forEach((line, i) => {
      const row = sheet.getRow(i + 2);
      expect(row.getCell('id').value).toBe(line.id);
      expect(row.getCell('name').value).toBe(line.name);
      expect(row.getCell('gross').value).toBe(line.gross);
      expect(row.getCell('tax').value).toBe(line.tax);
      expect(row.getCell('pension').value).toBe(line.pension);
      expect(row.getCell('net').value).toBe(line.net);
    });
    expect(sheet.getRow(2).getCell('name').value).toBe('Tunde Bello');
  });

  it('refuses to export an empty register', async () => {
    const empty = new PayrollExportService({ listAll: async () => [] }, path.join(dir, 'out.xlsx'));

    await expect(empty.buildWorkbook()).rejects.toBeInstanceOf(EmptyExportError);
    await expect(empty.writeExport()).rejects.toBeInstanceOf(EmptyExportError);
    expect(fs.existsSync(path.join(dir, 'out.xlsx'))).toBe(false);
  });

  it('writes the workbook to the configured path', async () => {
    const target = path.join(dir, 'payroll_export.xlsx');

    await expect(new PayrollExportService(reader, target).writeExport()).resolves.toBe(target);

    const written = new Workbook();
    await written.xlsx.readFile(target);
    expect(written.worksheets[0].rowCount).toBe(3);
    expect(written.worksheets[0].getRow(3).getCell(2).value).toBe('Amaka Obi');
  });
});
