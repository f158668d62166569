/** One row of the raw tick log as the aggregator reads it. `id` is the ingest order. */
export type RawTick = {
  id: number;
  symbol: string;
  price: number;
  quantity: number;
  tradeTimeMs: number;
};

/** Folded contribution of a set of ticks to one (bucket, symbol) candle. */
export type CandleDelta = {
  symbol: string;
  bucketSec: number;
  open: number;
  openTs: number;   // trade time (ms) of the tick defining open
  openSeq: number;  // its raw tick id
  high: number;
  low: number;
  close: number;
  closeTs: number;
  closeSeq: number;
  volume: number;
  tradeCount: number;
};

export type Candle = {
  symbol: string;
  ts: number;        // epoch seconds (bucket start)
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  tradeCount: number;
  sentiment: number;
};

// filled: synthetic flat candle carried forward from the previous close
export type SeriesCandle = Candle & { filled: boolean };

export type ForecastItem = {
  forecastTime: number;   // epoch seconds
  predictedPrice: number;
  lowerBound: number | null;
  upperBound: number | null;
};

export type ForecastRow = ForecastItem & { executionTime: number };

export type PassResult = { ticks: number; candles: number; cursor: number };
