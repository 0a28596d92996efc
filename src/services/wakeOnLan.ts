import dgram from 'dgram';
import { ValidationError, WakeSendError } from '../errors';
import { logger } from '../utils/logger';
import { isValidMAC, macToBytes, normalizeMAC } from './macAddress';

/**
 * Wake-on-LAN magic packet construction and transmission.
 *
 * Sending is best-effort and unacknowledged: a resolved send only means the
 * datagram was handed to the local network stack. Whether the target NIC is
 * armed, or the packet ever reaches it, is not observable here.
 */

export const DEFAULT_BROADCAST_ADDRESS = '255.255.255.255';
export const DEFAULT_WOL_PORT = 9;

const SYNC_STREAM_LENGTH = 6;
const MAC_REPETITIONS = 16;
const MAC_BYTE_LENGTH = 6;
export const MAGIC_PACKET_LENGTH = SYNC_STREAM_LENGTH + MAC_BYTE_LENGTH * MAC_REPETITIONS; // 102

/**
 * The subset of dgram.Socket used to send a magic packet.
 */
export interface DatagramSocket {
  bind(callback: () => void): unknown;
  setBroadcast(flag: boolean): void;
  send(
    msg: Buffer,
    port: number,
    address: string,
    callback: (error: Error | null) => void
  ): void;
  close(): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  removeListener(event: 'error', listener: (error: Error) => void): unknown;
}

export type DatagramSocketFactory = () => DatagramSocket;

export interface WakeOptions {
  address?: string;
  port?: number;
}

export interface WakeDispatch {
  mac: string;
  address: string;
  port: number;
  bytes: number;
}

/**
 * Build the 102-byte magic packet: six 0xFF bytes, then the MAC repeated 16 times.
 */
export function buildMagicPacket(macBytes: Uint8Array): Buffer {
  if (macBytes.length !== MAC_BYTE_LENGTH) {
    throw new ValidationError(
      `MAC address must be ${MAC_BYTE_LENGTH} bytes, received ${macBytes.length}`
    );
  }

  const packet = Buffer.alloc(MAGIC_PACKET_LENGTH, 0xff);
  for (let i = 0; i < MAC_REPETITIONS; i++) {
    packet.set(macBytes, SYNC_STREAM_LENGTH + i * MAC_BYTE_LENGTH);
  }
  return packet;
}

const createUdpSocket: DatagramSocketFactory = () => dgram.createSocket('udp4');

function bindSocket(socket: DatagramSocket): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(error);
    socket.on('error', onError);
    socket.bind(() => {
      socket.removeListener('error', onError);
      resolve();
    });
  });
}

function sendDatagram(
  socket: DatagramSocket,
  packet: Buffer,
  port: number,
  address: string
): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.send(packet, port, address, (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

class WakeOnLanSender {
  constructor(private readonly socketFactory: DatagramSocketFactory = createUdpSocket) {}

  async send(mac: string, options: WakeOptions = {}): Promise<WakeDispatch> {
    if (!isValidMAC(mac)) {
      throw new ValidationError(`Invalid MAC address: '${mac}'`);
    }

    const normalizedMac = normalizeMAC(mac);
    const address = options.address || DEFAULT_BROADCAST_ADDRESS;
    const port = options.port ?? DEFAULT_WOL_PORT;
    const packet = buildMagicPacket(macToBytes(normalizedMac));

    const socket = this.socketFactory();
    // Late socket errors (after close) must not crash the process
    const onLateError = (error: Error) => {
      logger.debug('UDP socket error after magic packet dispatch', { error: error.message });
    };
    socket.on('error', onLateError);

    try {
      await bindSocket(socket);
      socket.setBroadcast(true);
      await sendDatagram(socket, packet, port, address);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Failed to send Wake-on-LAN magic packet', {
        mac: normalizedMac,
        address,
        port,
        error: message,
      });
      throw new WakeSendError(`Failed to send magic packet to ${address}:${port}: ${message}`, error);
    } finally {
      try {
        socket.close();
      } catch (closeError) {
        logger.debug('UDP socket was already closed', {
          error: closeError instanceof Error ? closeError.message : String(closeError),
        });
      }
    }

    logger.info('Sent Wake-on-LAN magic packet', { mac: normalizedMac, address, port });

    return { mac: normalizedMac, address, port, bytes: packet.length };
  }
}

export default WakeOnLanSender;
