import { Controller, Get } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';

@Controller()
export class AppController {
  /**
   * Health check for load balancers and monitoring.
   *
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'holdings-analytics',
    };
  }

  /**
   * API root - returns service info and available endpoints.
   *
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Holdings Analytics API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        transactions: '/portfolio/transactions',
        import: '/portfolio/transactions/import',
        positions: '/portfolio/positions',
        snapshot: '/portfolio/snapshot',
        recap: '/portfolio/recap',
        refresh: '/portfolio/refresh',
        state: '/portfolio/state',
        quotes: '/market-price/quotes/:symbol',
        history: '/market-price/history/:symbol',
        symbols: '/symbols/normalize',
        aliases: '/symbols/aliases',
      },
    };
  }
}
