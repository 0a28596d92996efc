import { Request, Response } from 'express';
import { ProbeController } from '../probe';
import ProbeOrchestrator from '../../services/probeOrchestrator';
import DeviceRegistry from '../../services/deviceRegistry';
import { HostProber } from '../../services/livenessProbe';
import { ProbeResult } from '../../types';

describe('probe controller', () => {
  let orchestrator: ProbeOrchestrator;
  let prober: jest.Mock<Promise<ProbeResult>, Parameters<HostProber>>;
  let controller: ProbeController;
  let mockReq: Partial<Request>;
  let mockRes: Partial<Response>;

  beforeEach(() => {
    prober = jest.fn<Promise<ProbeResult>, Parameters<HostProber>>();
    orchestrator = new ProbeOrchestrator(new DeviceRegistry('/nonexistent/devices.json'), {}, prober);
    controller = new ProbeController(orchestrator, { port: 3389, timeoutMs: 1000 }, prober);

    mockReq = { body: {} };
    mockRes = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn().mockReturnThis(),
    };
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('probe', () => {
    it('should use the default port and timeout', async () => {
      prober.mockResolvedValue({ online: true, latency: 12 });
      mockReq.body = { address: '10.0.0.2' };

      await controller.probe(mockReq as Request, mockRes as Response);

      expect(prober).toHaveBeenCalledWith('10.0.0.2', 3389, 1000);
      expect(mockRes.status).toHaveBeenCalledWith(200);
      expect(mockRes.json).toHaveBeenCalledWith({ online: true, latency: 12 });
    });

    it('should convert the timeout from seconds', async () => {
      prober.mockResolvedValue({ online: false, latency: null });
      mockReq.body = { address: '10.0.0.2', port: 22, timeout: 0.25 };

      await controller.probe(mockReq as Request, mockRes as Response);

      expect(prober).toHaveBeenCalledWith('10.0.0.2', 22, 250);
      expect(mockRes.json).toHaveBeenCalledWith({ online: false, latency: null });
    });
  });

  it('should never pass a zero timeout for tiny fractions of a second', async () => {
    prober.mockResolvedValue({ online: false, latency: null });
    mockReq.body = { address: '10.0.0.2', timeout: 0.0004 };

    await controller.probe(mockReq as Request, mockRes as Response);

    expect(prober).toHaveBeenCalledWith('10.0.0.2', 3389, 1);
  });

  describe('refreshStatuses', () => {
    it('should respond with the refreshed statuses', async () => {
      const statuses = [{ mac: 'AA:BB:CC:DD:EE:FF', online: false as const, latency: null }];
      jest.spyOn(orchestrator, 'refreshAll').mockResolvedValue(statuses);

      await controller.refreshStatuses(mockReq as Request, mockRes as Response);

      expect(mockRes.status).toHaveBeenCalledWith(200);
      expect(mockRes.json).toHaveBeenCalledWith(statuses);
    });
  });

  describe('getStatuses', () => {
    it('should report an empty cache before the first refresh', () => {
      controller.getStatuses(mockReq as Request, mockRes as Response);

      expect(mockRes.json).toHaveBeenCalledWith({
        statuses: [],
        lastProbeTime: null,
        probeInProgress: false,
      });
    });
  });
});
