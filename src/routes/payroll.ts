import express, { Response, Router } from 'express';
import { InvalidInputError } from '../errors';
import { computePayroll, summarizePayroll } from '../services/payroll';
import { EXPORT_DOWNLOAD_NAME, PayrollExportService } from '../services/payrollExport';
import { StaffStore } from '../services/staffStore';
import { buildPayrollPage, PayrollPageModel } from '../templates/payrollHtml';
import { StaffSubmission } from '../types';

export default function payrollRouter(store: StaffStore, exporter: PayrollExportService) {
  const router = Router();
  router.use(express.urlencoded({ extended: false }));

  async function renderPage(res: Response, status: number, extra: Omit<PayrollPageModel, 'lines' | 'summary'> = {}) {
    const lines = await computePayroll(store);
    const html = buildPayrollPage({ lines, summary: summarizePayroll(lines), ...extra });
    return res.status(status).type('html').send(html);
  }

  router.get('/', async (_req, res, next) => {
    try {
      await renderPage(res, 200);
    } catch (err) {
      next(err);
    }
  });

  router.post('/', async (req, res, next) => {
    const submitted: StaffSubmission = req.body ?? {};
    try {
      await store.addStaff(submitted);
      return res.redirect(303, '/');
    } catch (err) {
      if (!(err instanceof InvalidInputError)) return next(err);
      try {
        await renderPage(res, 400, { issues: err.issues, submitted });
      } catch (renderErr) {
        next(renderErr);
      }
    }
  });

  router.get('/export', async (_req, res, next) => {
    try {
      const file = await exporter.writeExport();
      res.download(file, EXPORT_DOWNLOAD_NAME, (err) => {
        if (err) next(err);
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
