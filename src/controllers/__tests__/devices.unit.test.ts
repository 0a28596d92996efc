import { Request, Response } from 'express';
import { DevicesController } from '../devices';
import DeviceRegistry from '../../services/deviceRegistry';
import { NotFoundError, ValidationError } from '../../errors';

describe('devices controller', () => {
  let registry: DeviceRegistry;
  let controller: DevicesController;
  let mockReq: Partial<Request>;
  let mockRes: Partial<Response>;

  beforeEach(() => {
    registry = new DeviceRegistry('/nonexistent/devices.json');
    controller = new DevicesController(registry);

    mockReq = {
      params: {},
      body: {},
      query: {},
    };

    mockRes = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn().mockReturnThis(),
    };
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('listDevices', () => {
    it('should return records with snake_case broadcast_ip', async () => {
      jest
        .spyOn(registry, 'list')
        .mockResolvedValue([{ mac: 'AA:BB:CC:DD:EE:FF', broadcastIp: '192.168.1.255' }]);

      await controller.listDevices(mockReq as Request, mockRes as Response);

      expect(mockRes.status).toHaveBeenCalledWith(200);
      expect(mockRes.json).toHaveBeenCalledWith([
        { mac: 'AA:BB:CC:DD:EE:FF', broadcast_ip: '192.168.1.255' },
      ]);
    });

    it('should propagate registry failures', async () => {
      jest.spyOn(registry, 'list').mockRejectedValue(new Error('EACCES'));

      await expect(
        controller.listDevices(mockReq as Request, mockRes as Response)
      ).rejects.toThrow('EACCES');
    });
  });

  describe('addDevice', () => {
    it('should map the body onto the registry input and respond 201', async () => {
      const add = jest
        .spyOn(registry, 'add')
        .mockResolvedValue({ mac: 'AA:BB:CC:DD:EE:FF', remark: 'Desk PC', broadcastIp: '10.0.0.255' });
      mockReq.body = { mac: 'aa-bb-cc-dd-ee-ff', remark: 'Desk PC', broadcast_ip: '10.0.0.255' };

      await controller.addDevice(mockReq as Request, mockRes as Response);

      expect(add).toHaveBeenCalledWith({
        mac: 'aa-bb-cc-dd-ee-ff',
        ip: undefined,
        remark: 'Desk PC',
        broadcastIp: '10.0.0.255',
      });
      expect(mockRes.status).toHaveBeenCalledWith(201);
      expect(mockRes.json).toHaveBeenCalledWith({
        ok: true,
        device: { mac: 'AA:BB:CC:DD:EE:FF', remark: 'Desk PC', broadcast_ip: '10.0.0.255' },
      });
    });
  });

  describe('deleteDevice', () => {
    it('should respond with the canonical MAC of the removed device', async () => {
      jest.spyOn(registry, 'remove').mockResolvedValue({ mac: 'AA:BB:CC:DD:EE:FF' });
      mockReq.params = { mac: 'aabbccddeeff' };

      await controller.deleteDevice(mockReq as Request, mockRes as Response);

      expect(registry.remove).toHaveBeenCalledWith('aabbccddeeff');
      expect(mockRes.status).toHaveBeenCalledWith(200);
      expect(mockRes.json).toHaveBeenCalledWith({ ok: true, mac: 'AA:BB:CC:DD:EE:FF' });
    });

    it('should propagate NotFoundError', async () => {
      jest.spyOn(registry, 'remove').mockRejectedValue(new NotFoundError("Device 'x' not found"));
      mockReq.params = { mac: 'x' };

      await expect(
        controller.deleteDevice(mockReq as Request, mockRes as Response)
      ).rejects.toThrow(NotFoundError);
      expect(mockRes.status).not.toHaveBeenCalled();
    });
  });

  describe('searchDevices', () => {
    it('should search with the q parameter', async () => {
      const search = jest.spyOn(registry, 'search').mockResolvedValue([{ mac: 'AA:BB:CC:DD:EE:FF' }]);
      mockReq.query = { q: 'office' };

      await controller.searchDevices(mockReq as Request, mockRes as Response);

      expect(search).toHaveBeenCalledWith('office');
      expect(mockRes.json).toHaveBeenCalledWith([{ mac: 'AA:BB:CC:DD:EE:FF' }]);
    });

    it('should treat a missing q as an empty query', async () => {
      const search = jest.spyOn(registry, 'search').mockResolvedValue([]);

      await controller.searchDevices(mockReq as Request, mockRes as Response);

      expect(search).toHaveBeenCalledWith('');
    });

    it('should reject a repeated q parameter', async () => {
      mockReq.query = { q: ['a', 'b'] };

      await expect(
        controller.searchDevices(mockReq as Request, mockRes as Response)
      ).rejects.toThrow(ValidationError);
    });
  });
});
