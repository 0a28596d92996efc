import net from 'net';
import { ProbeResult } from '../types';
import { logger } from '../utils/logger';

export type HostProber = (
  address: string | undefined,
  port: number,
  timeoutMs: number
) => Promise<ProbeResult>;

export const OFFLINE: ProbeResult = Object.freeze({ online: false, latency: null });

/**
 * Check whether a TCP port accepts connections.
 *
 * Refused, timed out, unreachable and malformed targets all collapse into
 * OFFLINE; this never rejects. Latency is whole milliseconds from the start of
 * the attempt to the established connection.
 */
export const probeHost: HostProber = (address, port, timeoutMs) => {
  const host = address?.trim();
  if (!host) {
    return Promise.resolve(OFFLINE);
  }

  return new Promise<ProbeResult>((resolve) => {
    const socket = new net.Socket();
    const startedAt = performance.now();
    let settled = false;

    const finish = (result: ProbeResult, reason?: string) => {
      if (settled) return;
      settled = true;
      socket.destroy();
      if (reason) {
        logger.debug(`Probe ${host}:${port} offline`, { reason });
      }
      resolve(result);
    };

    // setTimeout(0) disables the idle timer entirely
    socket.setTimeout(Math.max(1, timeoutMs));
    socket.once('connect', () =>
      finish({ online: true, latency: Math.round(performance.now() - startedAt) })
    );
    socket.once('timeout', () => finish(OFFLINE, `timed out after ${timeoutMs}ms`));
    socket.once('error', (error) => finish(OFFLINE, error.message));

    try {
      socket.connect(port, host);
    } catch (error) {
      // Out-of-range ports are rejected synchronously
      finish(OFFLINE, error instanceof Error ? error.message : String(error));
    }
  });
};
