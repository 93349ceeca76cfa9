import { Counter, Gauge } from 'prom-client';

import { metricsRegistry } from './registry.js';

// Re-export the central registry
export { metricsRegistry as registry };

export const lendingOperationsTotal = new Counter({
  name: 'lending_operations_total',
  help: 'Pool operations by outcome',
  labelNames: ['operation', 'status'],
  registers: [metricsRegistry]
});

export const lendingOperationErrorsTotal = new Counter({
  name: 'lending_operation_errors_total',
  help: 'Aborted pool operations by error category and code',
  labelNames: ['operation', 'category', 'code'],
  registers: [metricsRegistry]
});

export const lendingLiquidationsTotal = new Counter({
  name: 'lending_liquidations_total',
  help: 'Executed liquidations by debt/collateral pair',
  labelNames: ['debtAsset', 'collateralAsset'],
  registers: [metricsRegistry]
});

export const lendingHealthChecksTotal = new Counter({
  name: 'lending_health_factor_checks_total',
  help: 'Health factor evaluations by result (healthy, liquidatable, no_debt)',
  labelNames: ['result'],
  registers: [metricsRegistry]
});

export const lendingPriceRejectionsTotal = new Counter({
  name: 'lending_price_rejections_total',
  help: 'Oracle quotes rejected by the price guard',
  labelNames: ['asset', 'reason'],
  registers: [metricsRegistry]
});

export const lendingReserveUtilization = new Gauge({
  name: 'lending_reserve_utilization',
  help: 'Reserve utilization after the last committed operation (0-1)',
  labelNames: ['asset'],
  registers: [metricsRegistry]
});
