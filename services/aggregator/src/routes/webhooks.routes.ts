import { Router } from 'express';
import { webhookForecastsCtrl, webhookSentimentCtrl } from '../controllers/webhooks.controller.js';
import { asyncHandler } from '../middleware/async-handler.js';

export const webhooks = Router();
webhooks.post('/webhooks/sentiment', asyncHandler(webhookSentimentCtrl));
webhooks.post('/webhooks/forecasts', asyncHandler(webhookForecastsCtrl));
