import { z } from 'zod';
import { isIPv4 } from 'node:net';
import { isValidMAC } from '../services/macAddress';

const MAC_MESSAGE = 'MAC address must contain exactly 12 hexadecimal digits (e.g. AA:BB:CC:DD:EE:FF)';

const macSchema = z
  .string({ required_error: 'MAC address is required' })
  .trim()
  .refine((value) => isValidMAC(value), { message: MAC_MESSAGE });

const portSchema = z
  .number()
  .int('Port must be an integer')
  .min(1, 'Port must be between 1 and 65535')
  .max(65_535, 'Port must be between 1 and 65535');

/**
 * Blank strings and null are treated as "not supplied"
 */
const optionalTextSchema = (label: string, max: number) =>
  z
    .string()
    .trim()
    .max(max, `${label} must not exceed ${max} characters`)
    .nullish()
    .transform((value) => (value ? value : undefined));

/**
 * Schema for validating device creation data
 */
export const addDeviceSchema = z.object({
  mac: macSchema,
  ip: optionalTextSchema('Address', 255),
  remark: optionalTextSchema('Remark', 500),
  broadcast_ip: optionalTextSchema('Broadcast address', 15).refine(
    (value) => value === undefined || isIPv4(value),
    { message: 'Broadcast address must be a valid IPv4 address' }
  ),
});

/**
 * Schema for validating the MAC path parameter on delete. Any string is
 * accepted; an unparseable MAC simply matches no device.
 */
export const macParamSchema = z.object({
  mac: z.string().min(1, 'MAC address is required'),
});

/**
 * Schema for validating wake-up request body. A null or 0 port means the default.
 */
export const wakeSchema = z.object({
  mac: macSchema,
  port: portSchema
    .or(z.literal(0))
    .nullish()
    .transform((port) => port || undefined),
  verify: z.boolean().optional(),
});

/**
 * Schema for validating a single liveness probe. `timeout` is in seconds.
 */
export const probeSchema = z.object({
  address: z.string().trim().min(1, 'Address is required').max(255, 'Address must not exceed 255 characters'),
  port: portSchema.optional(),
  timeout: z
    .number()
    .positive('Timeout must be positive')
    .max(30, 'Timeout must not exceed 30 seconds')
    .optional(),
});

export const searchQuerySchema = z.object({
  q: z.string().max(255, 'Query must not exceed 255 characters').optional().default(''),
});

export const logQuerySchema = z.object({
  lines: z.coerce
    .number()
    .int('lines must be an integer')
    .min(1, 'lines must be between 1 and 2000')
    .max(2_000, 'lines must be between 1 and 2000')
    .optional()
    .default(200),
});

export type AddDeviceBody = z.infer<typeof addDeviceSchema>;
export type WakeBody = z.infer<typeof wakeSchema>;
export type ProbeBody = z.infer<typeof probeSchema>;
