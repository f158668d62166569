// Append one raw tick. Redelivered trades collide on id_key and are ignored.
export const INSERT_RAW_TICK = `
  INSERT INTO raw_ticks (id_key, symbol, price, quantity, trade_id, trade_time, ingest_time)
  VALUES ($1, $2, $3, $4, $5, to_timestamp($6::double precision / 1000), to_timestamp($7::double precision / 1000))
  ON CONFLICT (id_key) DO NOTHING
`;
