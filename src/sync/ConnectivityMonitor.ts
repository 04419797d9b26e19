/**
 * Connectivity monitor
 *
 * `connected` is true only for a /health response whose status is "ok".
 * Connectivity never changes AuthMode.
 */

import { err, type Result } from '@/types/Result';
import type { HealthResponse, NetworkError } from '@/types/ApiTypes';
import { INITIAL_CONNECTIVITY, type ConnectivityStatus } from '@/types/ConnectivityTypes';
import { EventChannel, type Listener, type Unsubscribe } from '@/events/EventChannel';
import type { IApiServices } from '@/api/IApiServices';
import { describeNetworkError } from '@/api/NetworkErrors';
import type { IConnectivityMonitor } from './IConnectivityMonitor';

export class ConnectivityMonitor implements IConnectivityMonitor {
  private status: ConnectivityStatus = INITIAL_CONNECTIVITY;
  private inFlight: Promise<ConnectivityStatus> | null = null;
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private readonly changes = new EventChannel<ConnectivityStatus>('connectivity');

  constructor(
    private readonly api: IApiServices,
    private readonly now: () => number = Date.now
  ) {}

  getStatus(): ConnectivityStatus {
    return this.status;
  }

  isOnline(): boolean {
    return this.status.connected;
  }

  probe(): Promise<ConnectivityStatus> {
    if (!this.inFlight) {
      this.inFlight = this.runProbe().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  onStateChange(listener: Listener<ConnectivityStatus>): Unsubscribe {
    return this.changes.subscribe(listener);
  }

  startPolling(intervalMs: number): void {
    this.stopPolling();
    if (intervalMs <= 0) {
      return;
    }
    console.log(`[ConnectivityMonitor] Polling /health every ${intervalMs}ms`);
    this.pollTimer = setInterval(() => {
      this.probe().catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[ConnectivityMonitor] Poll failed: ${message}`);
      });
    }, intervalMs);
  }

  stopPolling(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
  }

  private async runProbe(): Promise<ConnectivityStatus> {
    let result: Result<HealthResponse, NetworkError>;
    try {
      result = await this.api.healthCheck();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      result = err({ type: 'TransportError', message });
    }

    let next: ConnectivityStatus;
    if (result.ok) {
      next = { connected: result.value.status === 'ok', lastError: null, message: null, checkedAt: this.now() };
    } else {
      next = {
        connected: false,
        lastError: result.error.type,
        message: connectivityMessage(result.error),
        checkedAt: this.now(),
      };
      console.warn(`[ConnectivityMonitor] Health check failed: ${result.error.type}`);
    }

    this.status = next;
    this.changes.emit(next);
    return next;
  }
}

export function connectivityMessage(error: NetworkError): string {
  switch (error.type) {
    case 'Offline':
      return 'Offline mode - some features may be limited';
    case 'Timeout':
      return 'Connection timeout - check your internet';
    case 'ServerError':
      return `Server issue (${error.code}) - please try again later`;
    default:
      return describeNetworkError(error);
  }
}

/**
 * One-line status for display.
 */
export function connectivitySummary(status: ConnectivityStatus): string {
  if (status.connected) {
    return 'Connected to services';
  }
  if (status.message) {
    return `Offline mode: ${status.message}`;
  }
  return 'Checking connection...';
}
