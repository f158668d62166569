import { z } from 'zod';

const EpochOrIso = z.union([z.number().nonnegative(), z.string().min(1)]);

export const SymbolParam = z.string().regex(/^[A-Za-z0-9]{2,20}$/, 'invalid symbol');

export const SentimentBody = z.object({
  bucketTime: EpochOrIso,
  score: z.number().min(-1).max(1),
  symbol: SymbolParam.optional(),
});

export const ForecastItemBody = z.object({
  forecastTime: EpochOrIso,
  predictedPrice: z.number().finite(),
  lowerBound: z.number().finite().nullable().optional(),
  upperBound: z.number().finite().nullable().optional(),
});

export const WebhookForecastsBody = z.object({
  executionTime: EpochOrIso.optional(),
  items: z.array(ForecastItemBody).min(1).max(10000),
});
