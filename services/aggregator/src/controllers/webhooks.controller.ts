import type { Request, Response } from 'express';
import { SentimentBody, WebhookForecastsBody } from '../utils/validators.js';
import { updateSentimentSvc } from '../services/candles.service.js';
import { appendForecastsSvc } from '../services/forecasts.service.js';

export async function webhookSentimentCtrl(req: Request, res: Response) {
  const parsed = SentimentBody.safeParse(req.body);
  if (!parsed.success)
    return res.status(400).json({ error: { code: 'VALIDATION_ERROR', message: parsed.error.message } });

  const { bucketTime, score, symbol } = parsed.data;
  const result = await updateSentimentSvc(bucketTime, score, symbol);
  return res.status(200).json(result);
}

export async function webhookForecastsCtrl(req: Request, res: Response) {
  const parsed = WebhookForecastsBody.safeParse(req.body);
  if (!parsed.success)
    return res.status(400).json({ error: { code: 'VALIDATION_ERROR', message: parsed.error.message } });

  const { executionTime, items } = parsed.data;
  const result = await appendForecastsSvc(executionTime, items);
  return res.status(201).json(result);
}
