import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';

export const requestId = (req: Request, res: Response, next: NextFunction) => {
  const id = req.get('x-request-id') || uuidv4();
  res.locals.requestId = id;
  res.setHeader('x-request-id', id);
  next();
};

export const requestIdOf = (res: Response): string => {
  const id: unknown = res.locals.requestId;
  return typeof id === 'string' ? id : 'unknown';
};
