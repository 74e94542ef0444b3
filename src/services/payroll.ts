import { PayrollLine, PayrollSummary, StaffRecord } from '../types';
import { StaffReader } from './staffStore';

export const TAX_RATE = 0.1;
export const PENSION_RATE = 0.08;
export const NET_PAY_THRESHOLD = 30000;

export function toPayrollLine(record: StaffRecord): PayrollLine {
  const gross = record.basic + record.housing + record.transport + record.feeding;
  const tax = gross * TAX_RATE;
  const pension = gross * PENSION_RATE;
  const net = gross - (tax + pension);
  return { ...record, gross, tax, pension, net };
}

/**
 * Recomputes every payroll line from the full register, highest net pay first.
 * Array#sort is stable, so equal net pay keeps the store's insertion order.
 */
export async function computePayroll(store: StaffReader): Promise<PayrollLine[]> {
  const records = await store.listAll();
  if (records.length === 0) return [];
  return records.map(toPayrollLine).sort((a, b) => b.net - a.net);
}

export function summarizePayroll(lines: PayrollLine[]): PayrollSummary {
  const headcount = lines.length;
  const totalGross = lines.reduce((sum, l) => sum + l.gross, 0);
  return {
    headcount,
    averageGross: headcount === 0 ? 0 : totalGross / headcount,
    aboveThresholdCount: lines.filter((l) => l.net > NET_PAY_THRESHOLD).length,
  };
}

export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

// Column order shared by the HTML table and the spreadsheet export.
export const PAYROLL_COLUMNS: ReadonlyArray<{ key: keyof PayrollLine; header: string }> = [
  { key: 'id', header: 'id' },
  { key: 'name', header: 'name' },
  { key: 'role', header: 'role' },
  { key: 'basic', header: 'basic' },
  { key: 'housing', header: 'housing' },
  { key: 'transport', header: 'transport' },
  { key: 'feeding', header: 'feeding' },
  { key: 'createdAt', header: 'created_at' },
  { key: 'gross', header: 'gross' },
  { key: 'tax', header: 'tax' },
  { key: 'pension', header: 'pension' },
  { key: 'net', header: 'net' },
];
