import express, { Router } from 'express';
import cors from 'cors';
import { computePayroll, roundTo2, summarizePayroll } from '../services/payroll';
import { StaffStore } from '../services/staffStore';
import { StaffSubmission } from '../types';

export default function apiRouter(store: StaffStore, corsOrigin: string) {
  const router = Router();
  router.use(cors({ origin: corsOrigin }));
  router.use(express.json());

  router.get('/payroll', async (_req, res, next) => {
    try {
      const lines = await computePayroll(store);
      const summary = summarizePayroll(lines);
      res.json({ lines, summary: { ...summary, averageGross: roundTo2(summary.averageGross) } });
    } catch (err) {
      next(err);
    }
  });

  router.post('/staff', async (req, res, next) => {
    const submission: StaffSubmission = req.body ?? {};
    try {
      const id = await store.addStaff(submission);
      res.status(201).json({ id });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
