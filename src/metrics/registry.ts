/**
 * prom-client Registry shared by the lending pool counters and gauges
 *
 * Holds the process default metrics too; it imports nothing else from metrics/.
 */

import { Registry, collectDefaultMetrics } from 'prom-client';

export const metricsRegistry = new Registry();
collectDefaultMetrics({ register: metricsRegistry });
