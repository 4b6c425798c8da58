/**
 * Server health statistics, reported through the healthCheck operation
 */

import type { HealthStatus } from '../bridge/models.js';
import type { CircuitState } from './circuit-breaker.js';

export class HealthMonitor {
  private readonly startedAt: number;
  private connectionsTotal = 0;
  private connectionsActive = 0;
  private requestsTotal = 0;
  private requestsFailed = 0;
  private lastError: string | null = null;

  constructor(private readonly now: () => number = Date.now) {
    this.startedAt = now();
  }

  recordConnection(): void {
    this.connectionsTotal++;
    this.connectionsActive++;
  }

  recordDisconnection(): void {
    this.connectionsActive = Math.max(0, this.connectionsActive - 1);
  }

  /**
   * Count one dispatched request. A success clears any recorded error.
   */
  recordRequest(success: boolean): void {
    this.requestsTotal++;
    if (success) {
      this.lastError = null;
    } else {
      this.requestsFailed++;
    }
  }

  /**
   * Remember a failure that was not the terminal's own (marks the server unhealthy)
   */
  recordError(message: string): void {
    this.lastError = message;
  }

  clearError(): void {
    this.lastError = null;
  }

  getStatus(circuitState: CircuitState = 'closed'): HealthStatus {
    return {
      healthy: this.lastError === null,
      uptime_seconds: (this.now() - this.startedAt) / 1000,
      connections_total: this.connectionsTotal,
      connections_active: this.connectionsActive,
      requests_total: this.requestsTotal,
      requests_failed: this.requestsFailed,
      last_error: this.lastError,
      circuit_state: circuitState,
    };
  }
}
