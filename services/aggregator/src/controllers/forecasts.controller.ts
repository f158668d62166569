import type { Request, Response } from 'express';
import { latestForecastBatchSvc } from '../services/forecasts.service.js';

export async function latestForecastsCtrl(_req: Request, res: Response) {
  res.json(await latestForecastBatchSvc());
}
