import WakeOnLanSender, {
  buildMagicPacket,
  DatagramSocket,
  MAGIC_PACKET_LENGTH,
} from '../wakeOnLan';
import { ValidationError, WakeSendError } from '../../errors';
import { logger } from '../../utils/logger';

interface SentDatagram {
  packet: Buffer;
  port: number;
  address: string;
}

class FakeSocket implements DatagramSocket {
  sent: SentDatagram[] = [];
  broadcast = false;
  closed = false;
  sendError: Error | null = null;

  bind(callback: () => void): void {
    callback();
  }

  setBroadcast(flag: boolean): void {
    this.broadcast = flag;
  }

  send(msg: Buffer, port: number, address: string, callback: (error: Error | null) => void): void {
    this.sent.push({ packet: Buffer.from(msg), port, address });
    callback(this.sendError);
  }

  close(): void {
    this.closed = true;
  }

  on(): this {
    return this;
  }

  removeListener(): this {
    return this;
  }
}

describe('wakeOnLan', () => {
  beforeEach(() => {
    logger.transports.forEach((transport) => {
      transport.silent = true;
    });
  });

  afterEach(() => {
    logger.transports.forEach((transport) => {
      transport.silent = false;
    });
  });

  describe('buildMagicPacket', () => {
    const mac = Buffer.from([0x01, 0x23, 0x45, 0x67, 0x89, 0xab]);

    it('should produce a 102-byte packet', () => {
      expect(buildMagicPacket(mac)).toHaveLength(MAGIC_PACKET_LENGTH);
      expect(MAGIC_PACKET_LENGTH).toBe(102);
    });

    it('should start with six 0xFF bytes', () => {
      expect([...buildMagicPacket(mac).subarray(0, 6)]).toEqual([0xff, 0xff, 0xff, 0xff, 0xff, 0xff]);
    });

    it('should repeat the MAC sixteen times', () => {
      const packet = buildMagicPacket(mac);
      for (let i = 0; i < 16; i++) {
        const offset = 6 + i * 6;
        expect(packet.subarray(offset, offset + 6).equals(mac)).toBe(true);
      }
    });

    it('should reject input that is not six bytes', () => {
      expect(() => buildMagicPacket(Buffer.from([1, 2, 3]))).toThrow(ValidationError);
    });
  });

  describe('WakeOnLanSender', () => {
    let socket: FakeSocket;
    let sender: WakeOnLanSender;

    beforeEach(() => {
      socket = new FakeSocket();
      sender = new WakeOnLanSender(() => socket);
    });

    it('should send to the global broadcast address on port 9 by default', async () => {
      const dispatch = await sender.send('aa-bb-cc-dd-ee-ff');

      expect(dispatch).toEqual({
        mac: 'AA:BB:CC:DD:EE:FF',
        address: '255.255.255.255',
        port: 9,
        bytes: 102,
      });
      expect(socket.sent).toHaveLength(1);
      expect(socket.sent[0].address).toBe('255.255.255.255');
      expect(socket.sent[0].port).toBe(9);
      expect(socket.broadcast).toBe(true);
      expect(socket.closed).toBe(true);
    });

    it('should honor address and port overrides', async () => {
      await sender.send('AA:BB:CC:DD:EE:FF', { address: '192.168.1.255', port: 7 });

      expect(socket.sent[0].address).toBe('192.168.1.255');
      expect(socket.sent[0].port).toBe(7);
    });

    it('should send the magic packet for the given MAC', async () => {
      await sender.send('01:23:45:67:89:ab');

      const expected = buildMagicPacket(Buffer.from([0x01, 0x23, 0x45, 0x67, 0x89, 0xab]));
      expect(socket.sent[0].packet.equals(expected)).toBe(true);
    });

    it('should reject invalid MACs without opening a socket', async () => {
      const factory = jest.fn(() => socket);
      sender = new WakeOnLanSender(factory);

      await expect(sender.send('aa:bb:cc')).rejects.toThrow(ValidationError);
      expect(factory).not.toHaveBeenCalled();
    });

    it('should wrap send failures in WakeSendError and close the socket', async () => {
      socket.sendError = new Error('EACCES');

      const attempt = sender.send('aa:bb:cc:dd:ee:ff', { address: '10.0.0.255', port: 9 });

      await expect(attempt).rejects.toThrow(WakeSendError);
      await expect(attempt).rejects.toThrow(
        'Failed to send magic packet to 10.0.0.255:9: EACCES'
      );
      expect(socket.closed).toBe(true);
    });

    it('should map WakeSendError to a 502 status', async () => {
      socket.sendError = new Error('ENETUNREACH');

      await expect(sender.send('aa:bb:cc:dd:ee:ff')).rejects.toMatchObject({
        statusCode: 502,
        code: 'WOL_SEND_FAILED',
      });
    });
  });
});
