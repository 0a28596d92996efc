import { Request, Response } from 'express';
import ProbeOrchestrator from '../services/probeOrchestrator';
import { HostProber, probeHost } from '../services/livenessProbe';
import { StatusResponse } from '../types';
import { ProbeBody } from '../validators/deviceValidator';

export interface ProbeDefaults {
  port: number;
  timeoutMs: number;
}

/**
 * Liveness probe API controller
 */
export class ProbeController {
  constructor(
    private readonly orchestrator: ProbeOrchestrator,
    private readonly defaults: ProbeDefaults,
    private readonly prober: HostProber = probeHost
  ) {}

  /**
   * @swagger
   * /api/probe:
   *   post:
   *     summary: Probe a single address
   *     description: Attempts a TCP connection and reports reachability and latency. Failures are reported as offline, never as errors.
   *     tags: [Status]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [address]
   *             properties:
   *               address:
   *                 type: string
   *                 example: 192.168.1.20
   *               port:
   *                 type: integer
   *                 default: 3389
   *               timeout:
   *                 type: number
   *                 description: Timeout in seconds
   *                 default: 1.0
   *     responses:
   *       200:
   *         description: Probe result
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/ProbeResult'
   *       400:
   *         $ref: '#/components/responses/BadRequest'
   */
  async probe(req: Request, res: Response): Promise<void> {
    const { address, port, timeout } = req.body as ProbeBody;
    const timeoutMs =
      timeout !== undefined ? Math.max(1, Math.ceil(timeout * 1000)) : this.defaults.timeoutMs;
    const result = await this.prober(address, port ?? this.defaults.port, timeoutMs);
    res.status(200).json(result);
  }

  /**
   * @swagger
   * /api/status/refresh:
   *   post:
   *     summary: Probe every registered device
   *     description: Probes all devices concurrently and returns one result per device. Devices without an address are reported offline.
   *     tags: [Status]
   *     responses:
   *       200:
   *         description: One status per device, correlate by mac
   *         content:
   *           application/json:
   *             schema:
   *               type: array
   *               items:
   *                 $ref: '#/components/schemas/DeviceStatus'
   *       429:
   *         $ref: '#/components/responses/TooManyRequests'
   */
  async refreshStatuses(_req: Request, res: Response): Promise<void> {
    const statuses = await this.orchestrator.refreshAll();
    res.status(200).json(statuses);
  }

  /**
   * @swagger
   * /api/status:
   *   get:
   *     summary: Last known device statuses
   *     tags: [Status]
   *     responses:
   *       200:
   *         description: Cached results of the most recent refresh
   */
  getStatuses(_req: Request, res: Response): void {
    const response: StatusResponse = {
      statuses: this.orchestrator.getLastStatuses(),
      lastProbeTime: this.orchestrator.getLastProbeTime(),
      probeInProgress: this.orchestrator.isProbeInProgress(),
    };
    res.status(200).json(response);
  }
}
