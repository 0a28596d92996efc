import { readFileSync } from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

// package.json sits two levels up from both src/config and dist/config
const manifest = z
  .object({ version: z.string().min(1) })
  .parse(JSON.parse(readFileSync(path.join(__dirname, '..', '..', 'package.json'), 'utf-8')));

const parsedCorsOrigins = process.env.CORS_ORIGINS
  ?.split(',')
  .map((origin) => origin.trim())
  .filter((origin) => origin.length > 0);

const defaultCorsOrigins = process.env.NODE_ENV === 'production' ? [] : ['*'];

export const config = {
  version: manifest.version,
  server: {
    port: parseInt(process.env.PORT || '5050', 10),
    host: process.env.HOST || '0.0.0.0',
    env: process.env.NODE_ENV || 'development',
  },
  storage: {
    devicesFile: process.env.DEVICES_FILE || './data/devices.json',
  },
  cors: {
    origins: parsedCorsOrigins && parsedCorsOrigins.length > 0
      ? parsedCorsOrigins
      : defaultCorsOrigins,
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
    dir: process.env.LOG_DIR || './logs',
    maxFileSize: parseInt(process.env.LOG_FILE_MAX_SIZE || '5242880', 10), // 5 MiB
    maxFiles: parseInt(process.env.LOG_MAX_FILES || '5', 10),
  },
  wol: {
    port: parseInt(process.env.WOL_PORT || '9', 10),
    broadcastAddress: process.env.WOL_BROADCAST_ADDRESS || '255.255.255.255',
  },
  probe: {
    port: parseInt(process.env.PROBE_PORT || '3389', 10), // RDP
    timeoutMs: parseInt(process.env.PROBE_TIMEOUT_MS || '1000', 10),
    concurrency: parseInt(process.env.PROBE_CONCURRENCY || '20', 10),
    // 0 disables background refresh; statuses are then only refreshed on demand
    refreshInterval: parseInt(process.env.STATUS_REFRESH_INTERVAL || '0', 10),
  },
  wakeVerification: {
    enabled: process.env.WAKE_VERIFY_ENABLED === 'true',
    timeoutMs: parseInt(process.env.WAKE_VERIFY_TIMEOUT_MS || '10000', 10),
    pollIntervalMs: parseInt(process.env.WAKE_VERIFY_POLL_INTERVAL_MS || '1000', 10),
  },
};
