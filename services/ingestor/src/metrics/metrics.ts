import { Registry, collectDefaultMetrics, Counter, Gauge } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const ticksReceived = new Counter({
  name: 'ingestor_ticks_received_total',
  help: 'Trade messages accepted by the parser',
  labelNames: ['symbol'],
  registers: [registry],
});

export const ticksRejected = new Counter({
  name: 'ingestor_ticks_rejected_total',
  help: 'Feed messages dropped by validation',
  labelNames: ['reason'],
  registers: [registry],
});

export const ticksStored = new Counter({
  name: 'ingestor_ticks_stored_total',
  help: 'Raw ticks appended to the store',
  labelNames: ['symbol'],
  registers: [registry],
});

export const ticksDuplicate = new Counter({
  name: 'ingestor_ticks_duplicate_total',
  help: 'Redelivered ticks ignored by the store',
  labelNames: ['symbol'],
  registers: [registry],
});

export const ticksLost = new Counter({
  name: 'ingestor_ticks_lost_total',
  help: 'Ticks dropped after store retries were exhausted or the writer queue was full',
  labelNames: ['symbol', 'cause'],
  registers: [registry],
});

export const storeRetries = new Counter({
  name: 'ingestor_store_retries_total',
  help: 'Retried raw tick appends',
  registers: [registry],
});

export const feedReconnects = new Counter({
  name: 'ingestor_feed_reconnects_total',
  help: 'Transitions into backoff',
  labelNames: ['symbol'],
  registers: [registry],
});

export const feedState = new Gauge({
  name: 'ingestor_feed_state',
  help: 'Current connection state per symbol (1 = active state)',
  labelNames: ['symbol', 'state'],
  registers: [registry],
});
