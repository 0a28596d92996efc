import { Device, WakeVerificationResult } from '../types';
import { HostProber, probeHost } from './livenessProbe';

export interface WakeVerificationOptions {
  enabled: boolean;
  timeoutMs: number;
  pollIntervalMs: number;
  probePort: number;
  probeTimeoutMs: number;
}

function elapsedSince(startedAtMs: number): number {
  return Math.max(0, Date.now() - startedAtMs);
}

function delay(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * Poll a freshly woken device until its probe port answers or the timeout
 * passes. Only devices with a registered `ip` can be confirmed.
 */
export async function verifyWake(
  device: Device | undefined,
  options: WakeVerificationOptions,
  prober: HostProber = probeHost
): Promise<WakeVerificationResult> {
  const { timeoutMs, pollIntervalMs } = options;
  const base = { enabled: options.enabled, timeoutMs, pollIntervalMs };

  if (!options.enabled) {
    return {
      ...base,
      status: 'not_requested',
      attempts: 0,
      elapsedMs: 0,
      message: 'Wake verification not requested',
    };
  }

  if (!device?.ip) {
    return {
      ...base,
      status: 'not_confirmed',
      attempts: 0,
      elapsedMs: 0,
      message: device
        ? `Device ${device.mac} has no address available for verification`
        : 'Device is not registered; no address available for verification',
    };
  }

  const startedAtMs = Date.now();
  let attempts = 0;

  while (elapsedSince(startedAtMs) <= timeoutMs) {
    attempts += 1;
    const result = await prober(device.ip, options.probePort, options.probeTimeoutMs);
    if (result.online) {
      return {
        ...base,
        status: 'woke',
        attempts,
        elapsedMs: elapsedSince(startedAtMs),
        latency: result.latency,
        message: `Device ${device.mac} answered on ${device.ip}:${options.probePort}`,
      };
    }

    const remainingMs = timeoutMs - elapsedSince(startedAtMs);
    if (remainingMs <= 0) {
      break;
    }
    await delay(Math.min(pollIntervalMs, remainingMs));
  }

  return {
    ...base,
    status: 'timeout',
    attempts,
    elapsedMs: elapsedSince(startedAtMs),
    message: `Wake verification timed out after ${timeoutMs}ms`,
  };
}
