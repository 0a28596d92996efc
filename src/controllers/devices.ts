import { Request, Response } from 'express';
import DeviceRegistry, { toRecord } from '../services/deviceRegistry';
import { formatZodError } from '../middleware/validateRequest';
import { ValidationError } from '../errors';
import { logger } from '../utils/logger';
import { AddDeviceBody, searchQuerySchema } from '../validators/deviceValidator';

/**
 * Device registry API controller
 */
export class DevicesController {
  constructor(private readonly registry: DeviceRegistry) {}

  /**
   * @swagger
   * /api/devices:
   *   get:
   *     summary: List all devices
   *     description: Returns every registered device in insertion order
   *     tags: [Devices]
   *     responses:
   *       200:
   *         description: Registered devices
   *         content:
   *           application/json:
   *             schema:
   *               type: array
   *               items:
   *                 $ref: '#/components/schemas/Device'
   *       500:
   *         $ref: '#/components/responses/InternalError'
   */
  async listDevices(_req: Request, res: Response): Promise<void> {
    const devices = await this.registry.list();
    res.status(200).json(devices.map(toRecord));
  }

  /**
   * @swagger
   * /api/devices:
   *   post:
   *     summary: Register a device
   *     description: >
   *       Adds a device keyed by its MAC address. The MAC may use any separator
   *       or case and is stored in canonical AA:BB:CC:DD:EE:FF form. Blank
   *       optional fields are omitted.
   *     tags: [Devices]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [mac]
   *             properties:
   *               mac:
   *                 type: string
   *                 example: 'aa-bb-cc-dd-ee-ff'
   *               ip:
   *                 type: string
   *                 description: Address used for liveness probing and search
   *                 example: 192.168.1.20
   *               remark:
   *                 type: string
   *                 example: Office workstation
   *               broadcast_ip:
   *                 type: string
   *                 format: ipv4
   *                 description: Directed broadcast address for cross-subnet wake
   *                 example: 192.168.1.255
   *     responses:
   *       201:
   *         description: Device registered
   *         content:
   *           application/json:
   *             schema:
   *               type: object
   *               properties:
   *                 ok:
   *                   type: boolean
   *                   example: true
   *                 device:
   *                   $ref: '#/components/schemas/Device'
   *       400:
   *         $ref: '#/components/responses/BadRequest'
   *       409:
   *         description: A device with this MAC is already registered
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Error'
   */
  async addDevice(req: Request, res: Response): Promise<void> {
    const body = req.body as AddDeviceBody;
    const device = await this.registry.add({
      mac: body.mac,
      ip: body.ip,
      remark: body.remark,
      broadcastIp: body.broadcast_ip,
    });
    res.status(201).json({ ok: true, device: toRecord(device) });
  }

  /**
   * @swagger
   * /api/devices/{mac}:
   *   delete:
   *     summary: Delete a device
   *     description: The MAC is normalized before lookup, so any accepted spelling works
   *     tags: [Devices]
   *     parameters:
   *       - in: path
   *         name: mac
   *         required: true
   *         schema:
   *           type: string
   *         example: 'AA:BB:CC:DD:EE:FF'
   *     responses:
   *       200:
   *         description: Device deleted
   *       404:
   *         $ref: '#/components/responses/NotFound'
   */
  async deleteDevice(req: Request, res: Response): Promise<void> {
    const removed = await this.registry.remove(req.params.mac);
    res.status(200).json({ ok: true, mac: removed.mac });
  }

  /**
   * @swagger
   * /api/search:
   *   get:
   *     summary: Search devices
   *     description: Case-insensitive substring match on MAC, address and remark. An empty query returns all devices.
   *     tags: [Devices]
   *     parameters:
   *       - in: query
   *         name: q
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Matching devices in registry order
   *         content:
   *           application/json:
   *             schema:
   *               type: array
   *               items:
   *                 $ref: '#/components/schemas/Device'
   */
  async searchDevices(req: Request, res: Response): Promise<void> {
    const parsed = searchQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw new ValidationError(formatZodError(parsed.error));
    }

    const devices = await this.registry.search(parsed.data.q);
    logger.debug(`Search '${parsed.data.q}' matched ${devices.length} device(s)`);
    res.status(200).json(devices.map(toRecord));
  }
}
