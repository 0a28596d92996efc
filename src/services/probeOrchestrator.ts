import { Device, DeviceStatus, ProbeResult } from '../types';
import { logger } from '../utils/logger';
import { HostProber, OFFLINE, probeHost } from './livenessProbe';

export interface ProbeOptions {
  port: number;
  timeoutMs: number;
  concurrency: number;
}

export const DEFAULT_PROBE_OPTIONS: ProbeOptions = {
  port: 3389,
  timeoutMs: 1000,
  concurrency: 20,
};

// Extra time a prober gets past its own timeout before the fan-out gives up on it
const FORCE_COMPLETE_GRACE_MS = 500;

/** The registry surface the orchestrator depends on; satisfied by DeviceRegistry. */
export interface RegistryDeps {
  list(): Promise<Device[]>;
  on(event: 'device-removed', listener: (device: Device) => void): unknown;
}

function offlineStatus(mac: string): DeviceStatus {
  return { mac, ...OFFLINE };
}

/**
 * Probes every registered device concurrently with a fixed ceiling on
 * in-flight connections, and keeps the most recent results.
 */
class ProbeOrchestrator {
  private readonly options: ProbeOptions;
  private refreshInterval?: NodeJS.Timeout;
  private inFlight: Promise<DeviceStatus[]> | null = null;
  private lastStatuses = new Map<string, DeviceStatus>();
  private lastProbeTime: Date | null = null;

  constructor(
    private readonly registry: RegistryDeps,
    options: Partial<ProbeOptions> = {},
    private readonly prober: HostProber = probeHost
  ) {
    this.options = { ...DEFAULT_PROBE_OPTIONS, ...options };
    if (!Number.isInteger(this.options.concurrency) || this.options.concurrency < 1) {
      throw new Error(`Probe concurrency must be a positive integer, got ${this.options.concurrency}`);
    }

    this.registry.on('device-removed', (device: Device) => {
      this.lastStatuses.delete(device.mac);
    });
  }

  /**
   * Probe the given devices. Returns one status per device, in completion
   * order; correlate by `mac`. Never rejects because of a single device.
   */
  async probeAll(devices: Device[]): Promise<DeviceStatus[]> {
    const results: DeviceStatus[] = [];
    const queue: Device[] = [];

    for (const device of devices) {
      if (device.ip && device.ip.trim().length > 0) {
        queue.push(device);
      } else {
        results.push(offlineStatus(device.mac));
      }
    }

    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < queue.length) {
        const device = queue[next];
        next += 1;
        results.push(await this.probeDevice(device));
      }
    };

    const workerCount = Math.min(this.options.concurrency, queue.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    return results;
  }

  /**
   * Probe the whole registry and cache the results. Callers arriving while a
   * refresh is running share its result.
   */
  refreshAll(): Promise<DeviceStatus[]> {
    if (this.inFlight) {
      logger.debug('Status refresh already in progress, joining it');
      return this.inFlight;
    }

    this.inFlight = this.runRefresh().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  isProbeInProgress(): boolean {
    return this.inFlight !== null;
  }

  getLastStatuses(): DeviceStatus[] {
    return Array.from(this.lastStatuses.values());
  }

  getLastProbeTime(): string | null {
    return this.lastProbeTime ? this.lastProbeTime.toISOString() : null;
  }

  startPeriodicRefresh(intervalMs: number): void {
    if (intervalMs <= 0) {
      logger.info('Periodic status refresh disabled');
      return;
    }

    this.stopPeriodicRefresh();
    logger.info(`Starting periodic status refresh every ${intervalMs / 1000}s`);
    this.refreshInterval = setInterval(() => {
      this.refreshAll().catch((error: unknown) => {
        logger.warn('Periodic status refresh failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }, intervalMs);
  }

  stopPeriodicRefresh(): void {
    if (this.refreshInterval) {
      clearInterval(this.refreshInterval);
      this.refreshInterval = undefined;
      logger.info('Stopped periodic status refresh');
    }
  }

  private async runRefresh(): Promise<DeviceStatus[]> {
    const devices = await this.registry.list();
    logger.debug(`Probing ${devices.length} device(s)`);

    const statuses = await this.probeAll(devices);
    this.lastStatuses = new Map(statuses.map((status) => [status.mac, status]));
    this.lastProbeTime = new Date();

    const onlineCount = statuses.filter((status) => status.online).length;
    logger.info(`Status refresh complete: ${onlineCount}/${statuses.length} online`);
    return statuses;
  }

  private async probeDevice(device: Device): Promise<DeviceStatus> {
    const { port, timeoutMs } = this.options;
    let deadline: NodeJS.Timeout | undefined;

    const forceComplete = new Promise<ProbeResult>((resolve) => {
      deadline = setTimeout(() => {
        logger.warn(`Probe for ${device.mac} did not settle in time, reporting offline`);
        resolve(OFFLINE);
      }, timeoutMs + FORCE_COMPLETE_GRACE_MS);
    });

    try {
      const result = await Promise.race([this.prober(device.ip, port, timeoutMs), forceComplete]);
      return { mac: device.mac, ...result };
    } catch (error) {
      logger.warn(`Probe for ${device.mac} failed unexpectedly, reporting offline`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return offlineStatus(device.mac);
    } finally {
      clearTimeout(deadline);
    }
  }
}

export default ProbeOrchestrator;
