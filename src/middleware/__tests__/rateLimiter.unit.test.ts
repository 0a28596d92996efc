import express from 'express';
import request from 'supertest';
import { apiLimiter, refreshLimiter, wakeLimiter } from '../rateLimiter';

jest.mock('../../utils/logger', () => ({
  logger: {
    warn: jest.fn(),
  },
}));

describe('rateLimiter middleware', () => {
  const createApp = (path: string, middleware: express.RequestHandler) => {
    const app = express();
    app.use(express.json());
    app.post(path, middleware, (_req, res) => {
      res.status(200).json({ ok: true });
    });
    return app;
  };

  it('exports middleware functions', () => {
    expect(typeof apiLimiter).toBe('function');
    expect(typeof wakeLimiter).toBe('function');
    expect(typeof refreshLimiter).toBe('function');
  });

  it('wakeLimiter throttles after 30 wake requests/minute', async () => {
    const app = createApp('/wake', wakeLimiter);

    for (let i = 0; i < 30; i += 1) {
      const response = await request(app).post('/wake');
      expect(response.status).toBe(200);
    }

    const limited = await request(app).post('/wake');

    expect(limited.status).toBe(429);
    expect(limited.body).toEqual({
      error: 'Too many wake requests. Please wait before trying again.',
      retryAfter: '1 minute',
    });
  });

  it('refreshLimiter throttles after 10 refreshes/minute and points at the cached read path', async () => {
    const app = createApp('/status/refresh', refreshLimiter);

    for (let i = 0; i < 10; i += 1) {
      const response = await request(app).post('/status/refresh');
      expect(response.status).toBe(200);
    }

    const limited = await request(app).post('/status/refresh');

    expect(limited.status).toBe(429);
    expect(limited.body).toEqual({
      error: 'Too many status refresh requests.',
      retryAfter: '1 minute',
      hint: 'Use GET /api/status to retrieve the last results instead',
    });
  });
});
