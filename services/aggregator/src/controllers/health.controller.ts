import type { Request, Response } from 'express';
import { freshnessSvc, readinessSvc } from '../services/health.service.js';

export async function liveness(_req: Request, res: Response) {
  res.json({ ok: true });
}

export async function readiness(_req: Request, res: Response) {
  const result = await readinessSvc();
  res.status(result.status === 'ready' ? 200 : 503).json(result);
}

export async function freshness(_req: Request, res: Response) {
  res.json(await freshnessSvc());
}
