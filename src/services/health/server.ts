import http from 'http';
import type { StorageGateway } from '../database/db';
import { describeError } from '../../utils/errors';

export interface HealthStatus {
  status: 'ok' | 'degraded';
  database: boolean;
  timestamp: string;
  service: string;
}

export function getHealthStatus(gateway: StorageGateway, now: Date = new Date()): HealthStatus {
  const database = gateway.isReachable();
  return {
    status: database ? 'ok' : 'degraded',
    database,
    timestamp: now.toISOString(),
    service: 'daily-expense-ledger',
  };
}

export function createHealthServer(gateway: StorageGateway): http.Server {
  const server = http.createServer((_req, res) => {
    const health = getHealthStatus(gateway);
    res.writeHead(health.database ? 200 : 503, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(health));
  });

  server.on('error', (error) => {
    console.error('[Health] Server error:', describeError(error));
  });

  return server;
}

export function startHealthServer(gateway: StorageGateway, port: number): http.Server {
  const server = createHealthServer(gateway);

  server.listen(port, () => {
    console.log(`[Health] Server running on port ${port}`);
  });

  return server;
}
