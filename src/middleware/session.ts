import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4, validate as isUuid } from 'uuid';

export const SESSION_COOKIE = 'sid';

/**
 * Give every client a session id cookie so flash notices can follow a redirect
 */
export const session = (req: Request, res: Response, next: NextFunction): void => {
  const existing: unknown = req.cookies?.[SESSION_COOKIE];

  if (typeof existing === 'string' && isUuid(existing)) {
    req.sessionId = existing;
  } else {
    req.sessionId = uuidv4();
    res.cookie(SESSION_COOKIE, req.sessionId, { httpOnly: true, sameSite: 'lax' });
  }

  next();
};
