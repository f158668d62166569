// src/db/sql.ts
const CANDLE_COLUMNS = `
  symbol,
  EXTRACT(EPOCH FROM bucket_time)::float8 AS ts,
  open, high, low, close,
  volume::float8                          AS volume,
  trade_count                             AS "tradeCount",
  sentiment_score::float8                 AS sentiment
`;

export const SQL = {
  cursor: {
    ensure: `
      INSERT INTO aggregator_cursors (name) VALUES ($1)
      ON CONFLICT (name) DO NOTHING
    `,
    // single-row lock: serializes passes racing on the same cursor
    lock: `
      SELECT last_tick_id::text AS "lastTickId"
      FROM aggregator_cursors
      WHERE name = $1
      FOR UPDATE
    `,
    advance: `
      UPDATE aggregator_cursors
      SET last_tick_id = $2, updated_at = now()
      WHERE name = $1
    `,
  },
  ticks: {
    /* $3 settle delay (ms). The batch stops below the first row younger than
       that, so the cursor never moves past an id that is not yet folded. */
    afterCursor: `
      SELECT
        id::text                                         AS id,
        symbol,
        price,
        quantity,
        (EXTRACT(EPOCH FROM trade_time) * 1000)::float8  AS "tradeTimeMs"
      FROM raw_ticks
      WHERE id > $1
        AND id < COALESCE(
          (SELECT min(u.id) FROM raw_ticks u
           WHERE u.id > $1
             AND u.stored_at > clock_timestamp() - ($3::float8 * interval '1 millisecond')),
          9223372036854775807
        )
      ORDER BY id ASC
      LIMIT $2
    `,
  },
  candles: {
    /* Batch merge of folded deltas, one row per (bucket_time, symbol).
       open/close move only when the incoming side is earlier/later by
       (trade time, raw tick id); sentiment_score is never written here. */
    upsertDeltas: `
      WITH rows AS (
        SELECT
          unnest($1::text[])                                    AS symbol,
          to_timestamp(unnest($2::float8[]))                    AS bucket_time,
          unnest($3::float8[])                                  AS open,
          to_timestamp(unnest($4::float8[]) / 1000)             AS open_ts,
          unnest($5::bigint[])                                  AS open_seq,
          unnest($6::float8[])                                  AS high,
          unnest($7::float8[])                                  AS low,
          unnest($8::float8[])                                  AS close,
          to_timestamp(unnest($9::float8[]) / 1000)             AS close_ts,
          unnest($10::bigint[])                                 AS close_seq,
          unnest($11::float8[])                                 AS volume,
          unnest($12::integer[])                                AS trade_count
      )
      INSERT INTO market_candles
        (bucket_time, symbol, open, high, low, close, volume, trade_count,
         open_ts, open_seq, close_ts, close_seq)
      SELECT bucket_time, symbol, open, high, low, close, volume, trade_count,
             open_ts, open_seq, close_ts, close_seq
      FROM rows
      ON CONFLICT (bucket_time, symbol) DO UPDATE SET
        open        = CASE WHEN (EXCLUDED.open_ts, EXCLUDED.open_seq) < (market_candles.open_ts, market_candles.open_seq)
                           THEN EXCLUDED.open ELSE market_candles.open END,
        open_ts     = CASE WHEN (EXCLUDED.open_ts, EXCLUDED.open_seq) < (market_candles.open_ts, market_candles.open_seq)
                           THEN EXCLUDED.open_ts ELSE market_candles.open_ts END,
        open_seq    = CASE WHEN (EXCLUDED.open_ts, EXCLUDED.open_seq) < (market_candles.open_ts, market_candles.open_seq)
                           THEN EXCLUDED.open_seq ELSE market_candles.open_seq END,
        high        = GREATEST(market_candles.high, EXCLUDED.high),
        low         = LEAST(market_candles.low, EXCLUDED.low),
        close       = CASE WHEN (EXCLUDED.close_ts, EXCLUDED.close_seq) > (market_candles.close_ts, market_candles.close_seq)
                           THEN EXCLUDED.close ELSE market_candles.close END,
        close_ts    = CASE WHEN (EXCLUDED.close_ts, EXCLUDED.close_seq) > (market_candles.close_ts, market_candles.close_seq)
                           THEN EXCLUDED.close_ts ELSE market_candles.close_ts END,
        close_seq   = CASE WHEN (EXCLUDED.close_ts, EXCLUDED.close_seq) > (market_candles.close_ts, market_candles.close_seq)
                           THEN EXCLUDED.close_seq ELSE market_candles.close_seq END,
        volume      = market_candles.volume + EXCLUDED.volume,
        trade_count = market_candles.trade_count + EXCLUDED.trade_count,
        updated_at  = now()
    `,
    range: `
      SELECT ${CANDLE_COLUMNS}
      FROM market_candles
      WHERE symbol = $1
        AND bucket_time >= to_timestamp($2)
        AND bucket_time <= to_timestamp($3)
      ORDER BY bucket_time ASC
    `,
    lastBefore: `
      SELECT ${CANDLE_COLUMNS}
      FROM market_candles
      WHERE symbol = $1 AND bucket_time < to_timestamp($2)
      ORDER BY bucket_time DESC
      LIMIT 1
    `,
    latest: `
      SELECT ${CANDLE_COLUMNS}
      FROM market_candles
      WHERE symbol = $1
      ORDER BY bucket_time DESC
      LIMIT 1
    `,
    newestPerSymbol: `
      SELECT symbol, EXTRACT(EPOCH FROM MAX(bucket_time))::float8 AS ts
      FROM market_candles
      GROUP BY symbol
      ORDER BY symbol ASC
    `,
    // $3 NULL updates every symbol of the bucket
    setSentiment: `
      UPDATE market_candles
      SET sentiment_score = $2, updated_at = now()
      WHERE bucket_time = to_timestamp($1)
        AND ($3::text IS NULL OR symbol = $3)
    `,
  },
  forecasts: {
    appendBatch: `
      INSERT INTO forecast_logs (execution_time, forecast_time, predicted_price, lower_bound, upper_bound)
      SELECT to_timestamp($1), to_timestamp(f.forecast_time), f.predicted_price, f.lower_bound, f.upper_bound
      FROM unnest($2::float8[], $3::float8[], $4::float8[], $5::float8[])
        AS f(forecast_time, predicted_price, lower_bound, upper_bound)
    `,
    latestBatch: `
      SELECT
        EXTRACT(EPOCH FROM execution_time)::float8 AS "executionTime",
        EXTRACT(EPOCH FROM forecast_time)::float8  AS "forecastTime",
        predicted_price                            AS "predictedPrice",
        lower_bound                                AS "lowerBound",
        upper_bound                                AS "upperBound"
      FROM forecast_logs
      WHERE execution_time = (SELECT MAX(execution_time) FROM forecast_logs)
      ORDER BY forecast_time ASC
    `,
  },
} as const;
