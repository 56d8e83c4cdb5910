import type { Express, Request, Response } from 'express';
import { z } from 'zod';
import type { RouteContext } from './context';
import { parseFormBoolean, requireService, sendFailure, sendValidationError } from './respond';

const DatasetFormSchema = z.object({
  name: z.string().min(1),
  subset: z.string().optional().transform((value) => value || undefined),
  streaming: z.unknown().transform((value, ctx) => {
    const parsed = parseFormBoolean(value);
    if (parsed === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'value could not be parsed to a boolean' });
      return z.NEVER;
    }
    return parsed;
  })
});

export const setupDatasetRoutes = (app: Express, { service, pool, upload }: RouteContext) => {
  // Accepts urlencoded and multipart forms
  app.post('/dataset', upload.none(), async (req: Request, res: Response) => {
    const svc = requireService(res, service);
    if (!svc) return;

    const form = DatasetFormSchema.safeParse(req.body ?? {});
    if (!form.success) {
      return sendValidationError(res, form.error);
    }

    try {
      const { name, subset, streaming } = form.data;
      const info = await pool.run(() => svc.loadDataset(name, subset, streaming));
      res.json({ status: 'success', dataset: info });
    } catch (error) {
      sendFailure(res, 'loading dataset', error);
    }
  });
};
