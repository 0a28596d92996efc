import { Request, Response } from 'express';
import DeviceRegistry from '../services/deviceRegistry';
import WakeOnLanSender from '../services/wakeOnLan';
import { verifyWake } from '../services/wakeVerification';
import { HostProber, probeHost } from '../services/livenessProbe';
import { WakeResponse } from '../types';
import { logger } from '../utils/logger';
import { WakeBody } from '../validators/deviceValidator';

export interface WakeSettings {
  defaultPort: number;
  broadcastAddress: string;
  probePort: number;
  probeTimeoutMs: number;
  verification: {
    enabled: boolean;
    timeoutMs: number;
    pollIntervalMs: number;
  };
}

/**
 * Wake-on-LAN API controller
 */
export class WakeController {
  constructor(
    private readonly registry: DeviceRegistry,
    private readonly sender: WakeOnLanSender,
    private readonly settings: WakeSettings,
    private readonly prober: HostProber = probeHost
  ) {}

  /**
   * @swagger
   * /api/wake:
   *   post:
   *     summary: Send a Wake-on-LAN magic packet
   *     description: >
   *       Sends one magic packet for the MAC. A registered device's broadcast_ip is
   *       used as destination when set, otherwise the global broadcast address.
   *       Delivery is not acknowledged; success only means the packet left this host.
   *     tags: [Wake-on-LAN]
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
   *                 example: 'AA:BB:CC:DD:EE:FF'
   *               port:
   *                 type: integer
   *                 default: 9
   *               verify:
   *                 type: boolean
   *                 description: Poll the device's probe port until it answers or the verification timeout passes
   *     responses:
   *       200:
   *         description: Magic packet sent
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/WakeResponse'
   *       400:
   *         $ref: '#/components/responses/BadRequest'
   *       429:
   *         $ref: '#/components/responses/TooManyRequests'
   *       502:
   *         description: The packet could not be sent
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Error'
   */
  async wakeDevice(req: Request, res: Response): Promise<void> {
    const { mac, port, verify } = req.body as WakeBody;
    const device = await this.registry.find(mac);
    const address = device?.broadcastIp || this.settings.broadcastAddress;
    const targetPort = port ?? this.settings.defaultPort;

    if (!device) {
      logger.info(`Waking unregistered MAC ${mac} via ${address}:${targetPort}`);
    }

    const dispatch = await this.sender.send(mac, { address, port: targetPort });

    const verification = await verifyWake(
      device,
      {
        enabled: verify ?? this.settings.verification.enabled,
        timeoutMs: this.settings.verification.timeoutMs,
        pollIntervalMs: this.settings.verification.pollIntervalMs,
        probePort: this.settings.probePort,
        probeTimeoutMs: this.settings.probeTimeoutMs,
      },
      this.prober
    );

    const response: WakeResponse = {
      ok: true,
      mac: dispatch.mac,
      address: dispatch.address,
      port: dispatch.port,
      message: 'Wake-on-LAN packet sent',
      verification,
    };
    res.status(200).json(response);
  }
}
