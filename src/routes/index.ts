/**
 * Express routes configuration
 */

import { Router } from 'express';
import { DevicesController } from '../controllers/devices';
import { WakeController, WakeSettings } from '../controllers/wake';
import { ProbeController, ProbeDefaults } from '../controllers/probe';
import { LogsController } from '../controllers/logs';
import DeviceRegistry from '../services/deviceRegistry';
import ProbeOrchestrator from '../services/probeOrchestrator';
import WakeOnLanSender from '../services/wakeOnLan';
import { HostProber, probeHost } from '../services/livenessProbe';
import { apiLimiter, refreshLimiter, wakeLimiter } from '../middleware/rateLimiter';
import { validateRequest } from '../middleware/validateRequest';
import {
  addDeviceSchema,
  macParamSchema,
  probeSchema,
  wakeSchema,
} from '../validators/deviceValidator';

export interface RouteDependencies {
  registry: DeviceRegistry;
  orchestrator: ProbeOrchestrator;
  wakeSender: WakeOnLanSender;
  wakeSettings: WakeSettings;
  probeDefaults: ProbeDefaults;
  logFile: string;
  prober?: HostProber;
}

export function createRoutes(deps: RouteDependencies): Router {
  const router = Router();
  const prober = deps.prober ?? probeHost;

  // Controllers
  const devicesController = new DevicesController(deps.registry);
  const wakeController = new WakeController(
    deps.registry,
    deps.wakeSender,
    deps.wakeSettings,
    prober
  );
  const probeController = new ProbeController(deps.orchestrator, deps.probeDefaults, prober);
  const logsController = new LogsController(deps.logFile);

  router.use(apiLimiter);

  // Device registry
  router.get('/devices', (req, res) => devicesController.listDevices(req, res));
  router.post('/devices', validateRequest(addDeviceSchema, 'body'), (req, res) =>
    devicesController.addDevice(req, res)
  );
  router.delete('/devices/:mac', validateRequest(macParamSchema, 'params'), (req, res) =>
    devicesController.deleteDevice(req, res)
  );
  router.get('/search', (req, res) => devicesController.searchDevices(req, res));

  // Wake-on-LAN
  router.post('/wake', wakeLimiter, validateRequest(wakeSchema, 'body'), (req, res) =>
    wakeController.wakeDevice(req, res)
  );

  // Liveness
  router.post('/probe', validateRequest(probeSchema, 'body'), (req, res) =>
    probeController.probe(req, res)
  );
  router.post('/status/refresh', refreshLimiter, (req, res) =>
    probeController.refreshStatuses(req, res)
  );
  router.get('/status', (req, res) => probeController.getStatuses(req, res));

  // Logs
  router.get('/logs', (req, res) => logsController.getLogs(req, res));

  return router;
}
