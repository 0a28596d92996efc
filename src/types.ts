/**
 * Type definitions for wakebox
 */

/** A registered device, keyed by canonical MAC. */
export interface Device {
  mac: string;
  ip?: string;
  remark?: string;
  broadcastIp?: string;
}

/** Input accepted by DeviceRegistry.add; optional fields may be blank. */
export interface DeviceInput {
  mac: string;
  ip?: string | null;
  remark?: string | null;
  broadcastIp?: string | null;
}

/** On-disk and wire representation. Absent fields are omitted. */
export interface DeviceRecord {
  mac: string;
  ip?: string;
  remark?: string;
  broadcast_ip?: string;
}

export type ProbeResult =
  | { online: true; latency: number }
  | { online: false; latency: null };

export type DeviceStatus = ProbeResult & { mac: string };

export interface StatusResponse {
  statuses: DeviceStatus[];
  lastProbeTime: string | null;
  probeInProgress: boolean;
}

export type WakeVerificationStatus = 'not_requested' | 'woke' | 'timeout' | 'not_confirmed';

export interface WakeVerificationResult {
  enabled: boolean;
  status: WakeVerificationStatus;
  attempts: number;
  timeoutMs: number;
  pollIntervalMs: number;
  elapsedMs: number;
  latency?: number;
  message: string;
}

export interface WakeResponse {
  ok: true;
  mac: string;
  address: string;
  port: number;
  message: string;
  verification: WakeVerificationResult;
}

export interface LogTailResponse {
  file: string;
  lines: string[];
}
