import { Request, Response } from 'express';
import { FlashService, FlashType } from '../services/FlashService';

export const flash = (req: Request, type: FlashType, message: string): void => {
  if (req.sessionId) {
    FlashService.add(req.sessionId, type, message);
  }
};

/**
 * Answer with the named view and the values it needs. Pending flash notices
 * are handed over and forgotten.
 */
export const render = (
  req: Request,
  res: Response,
  view: string,
  data: Record<string, unknown> = {},
  status: number = 200
) => {
  const flashes = req.sessionId ? FlashService.consume(req.sessionId) : [];
  return res.status(status).json({ view, ...data, flashes });
};
