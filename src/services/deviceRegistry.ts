import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { DuplicateError, NotFoundError, ValidationError } from '../errors';
import { Device, DeviceInput, DeviceRecord } from '../types';
import { logger } from '../utils/logger';
import { Mutex } from '../utils/mutex';
import { isValidMAC, normalizeMAC } from './macAddress';

/**
 * Device Registry
 * Flat, ordered list of devices persisted as a pretty-printed JSON array.
 *
 * Every operation runs under a mutex, so load-modify-save cycles never
 * interleave. The in-memory copy is reused until the file's mtime changes.
 *
 * Events: 'device-added' (Device), 'device-removed' (Device).
 */

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const storedDeviceSchema = z.object({
  mac: z.string(),
  ip: optionalText,
  remark: optionalText,
  broadcast_ip: optionalText,
});

function presentText(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Build a Device containing only the optional fields that carry a value.
 */
function buildDevice(
  mac: string,
  ip: string | null | undefined,
  remark: string | null | undefined,
  broadcastIp: string | null | undefined
): Device {
  const device: Device = { mac };
  const presentIp = presentText(ip);
  const presentRemark = presentText(remark);
  const presentBroadcastIp = presentText(broadcastIp);
  if (presentIp) device.ip = presentIp;
  if (presentRemark) device.remark = presentRemark;
  if (presentBroadcastIp) device.broadcastIp = presentBroadcastIp;
  return device;
}

export function toRecord(device: Device): DeviceRecord {
  const record: DeviceRecord = { mac: device.mac };
  if (device.ip) record.ip = device.ip;
  if (device.remark) record.remark = device.remark;
  if (device.broadcastIp) record.broadcast_ip = device.broadcastIp;
  return record;
}

export function fromRecord(record: DeviceRecord): Device {
  return buildDevice(record.mac, record.ip, record.remark, record.broadcast_ip);
}

function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

class DeviceRegistry extends EventEmitter {
  private readonly filePath: string;
  private readonly lock = new Mutex();
  private devices: Device[] | null = null;
  private loadedMtimeMs: number | null = null;

  constructor(filePath: string = './data/devices.json') {
    super();
    this.filePath = path.resolve(filePath);
  }

  getFilePath(): string {
    return this.filePath;
  }

  /**
   * Create the store if it is absent and load it into memory.
   */
  async initialize(): Promise<void> {
    const devices = await this.lock.runExclusive(() => this.load());
    logger.info(`Device registry loaded ${devices.length} device(s) from ${this.filePath}`);
  }

  async list(): Promise<Device[]> {
    return this.lock.runExclusive(async () => {
      const devices = await this.load();
      return devices.map((device) => ({ ...device }));
    });
  }

  async find(mac: string): Promise<Device | undefined> {
    const normalized = normalizeMAC(mac);
    if (!normalized) {
      return undefined;
    }

    return this.lock.runExclusive(async () => {
      const devices = await this.load();
      const device = devices.find((candidate) => candidate.mac === normalized);
      return device ? { ...device } : undefined;
    });
  }

  /**
   * Case-insensitive substring search over mac, ip and remark.
   * An empty query returns every device in registry order.
   */
  async search(query: string): Promise<Device[]> {
    const needle = query.trim().toLowerCase();
    const devices = await this.list();
    if (!needle) {
      return devices;
    }

    return devices.filter((device) =>
      [device.mac, device.ip, device.remark].some((field) =>
        String(field ?? '').toLowerCase().includes(needle)
      )
    );
  }

  async add(input: DeviceInput): Promise<Device> {
    if (!isValidMAC(input.mac)) {
      throw new ValidationError(
        `Invalid MAC address '${input.mac}': expected exactly 12 hexadecimal digits`
      );
    }

    const mac = normalizeMAC(input.mac);
    const device = buildDevice(mac, input.ip, input.remark, input.broadcastIp);

    await this.lock.runExclusive(async () => {
      const devices = await this.load();
      if (devices.some((existing) => existing.mac === mac)) {
        throw new DuplicateError(`Device ${mac} is already registered`);
      }

      await this.save([...devices, device]);
    });

    logger.info(`Registered device ${mac}`, { device: toRecord(device) });
    this.emit('device-added', device);
    return { ...device };
  }

  /**
   * Remove the device with the given MAC (any accepted spelling).
   */
  async remove(mac: string): Promise<Device> {
    const normalized = normalizeMAC(mac);

    const removed = await this.lock.runExclusive(async () => {
      const devices = await this.load();
      const index = normalized ? devices.findIndex((device) => device.mac === normalized) : -1;
      if (index === -1) {
        throw new NotFoundError(`Device '${mac}' not found`);
      }

      const target = devices[index];
      await this.save([...devices.slice(0, index), ...devices.slice(index + 1)]);
      return target;
    });

    logger.info(`Removed device ${removed.mac}`);
    this.emit('device-removed', removed);
    return removed;
  }

  /**
   * Load the store, reusing the cached copy when the file has not changed.
   * Must run under the lock.
   */
  private async load(): Promise<Device[]> {
    let mtimeMs: number;
    try {
      mtimeMs = (await fs.stat(this.filePath)).mtimeMs;
    } catch (error) {
      if (!isMissingFileError(error)) {
        throw error;
      }
      logger.info(`Device store not found, creating empty store at ${this.filePath}`);
      await this.save([]);
      return [];
    }

    if (this.devices && this.loadedMtimeMs === mtimeMs) {
      return this.devices;
    }

    const raw = await fs.readFile(this.filePath, 'utf-8');
    const parsed = this.parse(raw);
    if (parsed === null) {
      await this.quarantineCorruptStore();
      await this.save([]);
      return [];
    }

    this.devices = parsed;
    this.loadedMtimeMs = mtimeMs;
    return parsed;
  }

  /**
   * Parse the stored JSON. Returns null when the store as a whole is unreadable;
   * individual bad or duplicate entries are skipped.
   */
  private parse(raw: string): Device[] | null {
    if (raw.trim().length === 0) {
      return [];
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      logger.error('Device store is not valid JSON; treating it as empty', {
        file: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    if (!Array.isArray(data)) {
      logger.error('Device store is not a JSON array; treating it as empty', {
        file: this.filePath,
      });
      return null;
    }

    const devices: Device[] = [];
    const seen = new Set<string>();
    data.forEach((entry: unknown, index) => {
      const result = storedDeviceSchema.safeParse(entry);
      if (!result.success) {
        logger.warn('Skipping malformed device entry in store', { index });
        return;
      }

      const mac = normalizeMAC(result.data.mac);
      if (!mac) {
        logger.warn('Skipping device entry with invalid MAC address', {
          index,
          mac: result.data.mac,
        });
        return;
      }
      if (seen.has(mac)) {
        logger.warn('Skipping duplicate device entry in store', { index, mac });
        return;
      }

      seen.add(mac);
      devices.push(fromRecord({ ...result.data, mac }));
    });

    return devices;
  }

  /**
   * Move an unreadable store aside so the next save does not destroy it.
   */
  private async quarantineCorruptStore(): Promise<void> {
    const backupPath = `${this.filePath}.corrupt-${Date.now()}`;
    try {
      await fs.rename(this.filePath, backupPath);
      logger.error(`Corrupt device store moved to ${backupPath}; registry reset to empty`);
    } catch (error) {
      logger.error('Failed to preserve corrupt device store; registry reset to empty', {
        file: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Rewrite the whole store. Must run under the lock.
   */
  private async save(devices: Device[]): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    const payload = JSON.stringify(devices.map(toRecord), null, 2);
    await fs.writeFile(tempPath, `${payload}\n`, 'utf-8');
    await fs.rename(tempPath, this.filePath);

    this.devices = devices;
    this.loadedMtimeMs = (await fs.stat(this.filePath)).mtimeMs;
  }
}

export default DeviceRegistry;
