import type { NextFunction, Request, RequestHandler, Response } from 'express';

const OPEN_PATHS = new Set(['/health']);

export const createApiKeyGate = (apiKey?: string): RequestHandler => {
  if (!apiKey) {
    console.warn('API_KEY not configured; endpoints are unprotected');
  }

  return (req: Request, res: Response, next: NextFunction) => {
    if (OPEN_PATHS.has(req.path) || !apiKey) {
      return next();
    }

    // Express lower-cases header names
    const provided = req.get('x-api-key');
    if (provided !== apiKey) {
      return res.status(401).json({ detail: 'Unauthorized - invalid API key' });
    }

    next();
  };
};
