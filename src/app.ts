import express from 'express';
import { AppConfig } from './config';
import { errorHandler } from './middleware/errorHandler';
import apiRouter from './routes/api';
import payrollRouter from './routes/payroll';
import { PayrollExportService } from './services/payrollExport';
import { StaffStore } from './services/staffStore';

export function createApp(store: StaffStore, config: Pick<AppConfig, 'exportFile' | 'corsOrigin'>) {
  const app = express();
  const exporter = new PayrollExportService(store, config.exportFile);

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });
  app.use('/api', apiRouter(store, config.corsOrigin));
  app.use('/', payrollRouter(store, exporter));
  app.use(errorHandler);

  return app;
}
