import { Router } from 'express';
import { candleSeriesCtrl, latestCandleCtrl } from '../controllers/candles.controller.js';
import { latestForecastsCtrl } from '../controllers/forecasts.controller.js';
import { asyncHandler } from '../middleware/async-handler.js';

export const pub = Router();
pub.get('/candles/:symbol', asyncHandler(candleSeriesCtrl));
pub.get('/candles/:symbol/latest', asyncHandler(latestCandleCtrl));
pub.get('/forecasts/latest', asyncHandler(latestForecastsCtrl));
