import type { Request, Response } from 'express';
import { SymbolParam } from '../utils/validators.js';
import { candleSeriesSvc, latestCandleSvc } from '../services/candles.service.js';

export async function candleSeriesCtrl(req: Request, res: Response) {
  const symbol = SymbolParam.parse(req.params.symbol);
  const { from, to, limit } = req.query;
  const payload = await candleSeriesSvc(symbol, { from, to, limit });
  res.json(payload);
}

export async function latestCandleCtrl(req: Request, res: Response) {
  const symbol = SymbolParam.parse(req.params.symbol);
  res.json(await latestCandleSvc(symbol));
}
