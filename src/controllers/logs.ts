import { promises as fs } from 'fs';
import path from 'path';
import { Request, Response } from 'express';
import { formatZodError } from '../middleware/validateRequest';
import { ValidationError } from '../errors';
import { LogTailResponse } from '../types';
import { logQuerySchema } from '../validators/deviceValidator';

/**
 * Log retrieval API controller
 */
export class LogsController {
  constructor(private readonly logFile: string) {}

  /**
   * @swagger
   * /api/logs:
   *   get:
   *     summary: Tail the service log
   *     tags: [Logs]
   *     parameters:
   *       - in: query
   *         name: lines
   *         schema:
   *           type: integer
   *           minimum: 1
   *           maximum: 2000
   *           default: 200
   *     responses:
   *       200:
   *         description: Most recent log lines, oldest first
   *       400:
   *         $ref: '#/components/responses/BadRequest'
   */
  async getLogs(req: Request, res: Response): Promise<void> {
    const parsed = logQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw new ValidationError(formatZodError(parsed.error));
    }

    const lines = await this.readTail(parsed.data.lines);
    const response: LogTailResponse = { file: path.basename(this.logFile), lines };
    res.status(200).json(response);
  }

  private async readTail(count: number): Promise<string[]> {
    let content: string;
    try {
      content = await fs.readFile(this.logFile, 'utf-8');
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const lines = content.split('\n').filter((line) => line.length > 0);
    return lines.slice(-count);
  }
}
