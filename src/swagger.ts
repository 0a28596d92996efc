import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';
import { config } from './config';

const macExample = 'AA:BB:CC:DD:EE:FF';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'wakebox API',
      version: config.version,
      description:
        'Device registry with Wake-on-LAN dispatch and TCP liveness probing. Wake packets are best-effort and unacknowledged.',
      license: {
        name: 'Apache 2.0',
        url: 'https://www.apache.org/licenses/LICENSE-2.0.html',
      },
    },
    servers: [
      {
        url: 'http://localhost:5050',
        description: 'Development server',
      },
    ],
    tags: [
      { name: 'Devices', description: 'Device registry' },
      { name: 'Wake-on-LAN', description: 'Remote power-on' },
      { name: 'Status', description: 'TCP liveness probing' },
      { name: 'Logs', description: 'Service log retrieval' },
      { name: 'Health', description: 'Service health and status' },
    ],
    components: {
      schemas: {
        Device: {
          type: 'object',
          properties: {
            mac: {
              type: 'string',
              pattern: '^([0-9A-F]{2}:){5}[0-9A-F]{2}$',
              description: 'Canonical MAC address',
              example: macExample,
            },
            ip: {
              type: 'string',
              description: 'Address used for probing and search',
              example: '192.168.1.20',
            },
            remark: {
              type: 'string',
              example: 'Office workstation',
            },
            broadcast_ip: {
              type: 'string',
              format: 'ipv4',
              description: 'Destination for magic packets; global broadcast when absent',
              example: '192.168.1.255',
            },
          },
          required: ['mac'],
        },
        ProbeResult: {
          type: 'object',
          properties: {
            online: { type: 'boolean', example: true },
            latency: {
              type: 'integer',
              nullable: true,
              description: 'Connect time in milliseconds, null when offline',
              example: 3,
            },
          },
        },
        DeviceStatus: {
          allOf: [
            { $ref: '#/components/schemas/ProbeResult' },
            {
              type: 'object',
              properties: {
                mac: { type: 'string', example: macExample },
              },
            },
          ],
        },
        WakeResponse: {
          type: 'object',
          properties: {
            ok: { type: 'boolean', example: true },
            mac: { type: 'string', example: macExample },
            address: { type: 'string', example: '192.168.1.255' },
            port: { type: 'integer', example: 9 },
            message: { type: 'string', example: 'Wake-on-LAN packet sent' },
            verification: {
              type: 'object',
              properties: {
                enabled: { type: 'boolean' },
                status: {
                  type: 'string',
                  enum: ['not_requested', 'woke', 'timeout', 'not_confirmed'],
                },
                attempts: { type: 'integer' },
                timeoutMs: { type: 'integer' },
                pollIntervalMs: { type: 'integer' },
                elapsedMs: { type: 'integer' },
                latency: { type: 'integer' },
                message: { type: 'string' },
              },
            },
          },
        },
        HealthCheck: {
          type: 'object',
          properties: {
            uptime: { type: 'number', example: 73.87 },
            timestamp: { type: 'integer', example: 1763544894939 },
            status: { type: 'string', enum: ['ok', 'degraded'] },
            environment: { type: 'string', example: 'development' },
            version: { type: 'string', example: '0.1.0' },
            checks: {
              type: 'object',
              properties: {
                deviceStore: { type: 'string', enum: ['healthy', 'unhealthy', 'unknown'] },
                statusProbe: { type: 'string', enum: ['running', 'idle'] },
              },
            },
          },
        },
        Error: {
          type: 'object',
          properties: {
            error: {
              type: 'object',
              properties: {
                code: { type: 'string', example: 'VALIDATION_ERROR' },
                message: { type: 'string' },
                statusCode: { type: 'integer', example: 400 },
                timestamp: { type: 'string', format: 'date-time' },
                path: { type: 'string', example: '/api/devices' },
              },
            },
          },
        },
      },
      responses: {
        BadRequest: {
          description: 'Invalid request parameters',
          content: {
            'application/json': {
              schema: { $ref: '#/components/schemas/Error' },
            },
          },
        },
        NotFound: {
          description: 'Resource not found',
          content: {
            'application/json': {
              schema: { $ref: '#/components/schemas/Error' },
            },
          },
        },
        TooManyRequests: {
          description: 'Rate limit exceeded',
          content: {
            'application/json': {
              schema: {
                type: 'object',
                properties: {
                  error: { type: 'string' },
                  retryAfter: { type: 'string', example: '1 minute' },
                },
              },
            },
          },
        },
        InternalError: {
          description: 'Internal server error',
          content: {
            'application/json': {
              schema: { $ref: '#/components/schemas/Error' },
            },
          },
        },
      },
    },
  },
  // Source globs resolve next to this file, so docs work from src/ and dist/
  apis: [path.join(__dirname, 'controllers', '*.{ts,js}'), path.join(__dirname, 'app.{ts,js}')],
};

export const specs = swaggerJsdoc(options);
