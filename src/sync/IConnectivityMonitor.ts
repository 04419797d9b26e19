/**
 * Connectivity monitor interface
 *
 * Responsibility: own ConnectivityStatus, run the /health probe, notify changes
 * Test strategy: mock IApiServices.healthCheck
 */

import type { ConnectivityStatus } from '@/types/ConnectivityTypes';
import type { Listener, Unsubscribe } from '@/events/EventChannel';

export interface IConnectivityMonitor {
  getStatus(): ConnectivityStatus;
  isOnline(): boolean;

  /**
   * Runs the health check. Concurrent calls share one request. Never rejects.
   */
  probe(): Promise<ConnectivityStatus>;

  /** Called after every completed probe */
  onStateChange(listener: Listener<ConnectivityStatus>): Unsubscribe;

  /** Probes every intervalMs until stopPolling(); 0 disables */
  startPolling(intervalMs: number): void;
  stopPolling(): void;
}
