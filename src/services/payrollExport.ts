import { Workbook } from 'exceljs';
import { EmptyExportError } from '../errors';
import { PAYROLL_COLUMNS, computePayroll } from './payroll';
import { StaffReader } from './staffStore';

export const EXPORT_DOWNLOAD_NAME = 'payroll_export.xlsx';
export const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export class PayrollExportService {
  constructor(
    private readonly store: StaffReader,
    private readonly exportFile: string
  ) {}

  async buildWorkbook(): Promise<Workbook> {
    const lines = await computePayroll(this.store);
    if (lines.length === 0) throw new EmptyExportError();

    const workbook = new Workbook();
    const worksheet = workbook.addWorksheet('Payroll');

    worksheet.columns = PAYROLL_COLUMNS.map(({ key, header }) => ({
      header,
      key,
      width: key === 'name' || key === 'createdAt' ? 22 : 12,
    }));

    lines.forEach((line) => {
      worksheet.addRow({ ...line });
    });

    return workbook;
  }

  /**
   * Writes the export to the configured path and returns that path.
   * Concurrent exports share the file; the last one to finish wins.
   */
  async writeExport(): Promise<string> {
    const workbook = await this.buildWorkbook();
    await workbook.xlsx.writeFile(this.exportFile);
    return this.exportFile;
  }
}
