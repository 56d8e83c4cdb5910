import type { Express, Request, Response } from 'express';
import type { RouteContext } from './context';
import { sendError } from './respond';

export const setupHealthRoutes = (app: Express, { service }: Pick<RouteContext, 'service'>) => {
  // Liveness; the API-key gate lets this through
  app.get('/health', (req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' });
  });

  // Readiness does not call the provider, it only checks the service was built
  app.get('/ready', (req: Request, res: Response) => {
    if (!service) {
      return sendError(res, 503, 'service not ready: HF_TOKEN missing');
    }
    res.status(200).json({ status: 'ready' });
  });
};
