import type { Express, Request, Response } from 'express';
import { z } from 'zod';
import { type AnyToAnyPayload, DEFAULT_MAX_NEW_TOKENS, DEFAULT_MODELS } from '../types/inference';
import type { RouteContext } from './context';
import { requireService, sendError, sendFailure, sendValidationError } from './respond';

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value || undefined);

const ChatRequestSchema = z.object({
  prompt: z.string(),
  model: optionalText,
  max_new_tokens: z.coerce.number().int().nullish()
});

const ImageFormSchema = z.object({
  model: optionalText
});

const VqaFormSchema = z.object({
  question: z.string().min(1),
  model: optionalText
});

const AnyToAnyFormSchema = z.object({
  input_type: z.string().min(1),
  output_type: z.string().min(1),
  model: optionalText,
  text: z.string().optional(),
  question: optionalText
});

// An uploaded file wins over text; image->vqa bundles the question with the image
const buildPayload = (
  inputType: string,
  outputType: string,
  file: Buffer | undefined,
  text: string | undefined,
  question: string | undefined
): AnyToAnyPayload | null => {
  if (file) {
    return inputType === 'image' && outputType === 'vqa'
      ? { kind: 'image-question', image: file, question }
      : { kind: 'bytes', data: file };
  }
  if (text !== undefined) {
    return { kind: 'text', text };
  }
  return null;
};

const missingFile = (res: Response) => sendError(res, 400, 'file: Required');

export const setupMLRoutes = (app: Express, { service, pool, upload }: RouteContext) => {
  // Text generation
  app.post('/chat', async (req: Request, res: Response) => {
    const svc = requireService(res, service);
    if (!svc) return;

    const body = ChatRequestSchema.safeParse(req.body ?? {});
    if (!body.success) {
      return sendValidationError(res, body.error);
    }

    try {
      const { prompt } = body.data;
      const model = body.data.model || DEFAULT_MODELS.textGeneration;
      const maxNewTokens = body.data.max_new_tokens ?? DEFAULT_MAX_NEW_TOKENS;
      const output = await pool.run(() => svc.generateText(prompt, model, maxNewTokens));
      res.json({ status: 'success', model, output });
    } catch (error) {
      sendFailure(res, 'processing chat request', error);
    }
  });

  // Speech to text
  app.post('/voice', upload.single('file'), async (req: Request, res: Response) => {
    const svc = requireService(res, service);
    if (!svc) return;

    const audio = req.file?.buffer;
    if (!audio) {
      return missingFile(res);
    }

    try {
      const text = await pool.run(() => svc.transcribeAudio(audio));
      res.json({ status: 'success', text });
    } catch (error) {
      sendFailure(res, 'transcribing audio', error);
    }
  });

  // Image captioning
  app.post('/image', upload.single('file'), async (req: Request, res: Response) => {
    const svc = requireService(res, service);
    if (!svc) return;

    const image = req.file?.buffer;
    if (!image) {
      return missingFile(res);
    }
    const form = ImageFormSchema.safeParse(req.body ?? {});
    if (!form.success) {
      return sendValidationError(res, form.error);
    }

    try {
      const model = form.data.model || DEFAULT_MODELS.imageCaptioning;
      const caption = await pool.run(() => svc.analyzeImage(image, model));
      res.json({ status: 'success', model, caption });
    } catch (error) {
      sendFailure(res, 'captioning image', error);
    }
  });

  // Visual question answering
  app.post('/vqa', upload.single('file'), async (req: Request, res: Response) => {
    const svc = requireService(res, service);
    if (!svc) return;

    const image = req.file?.buffer;
    if (!image) {
      return missingFile(res);
    }
    const form = VqaFormSchema.safeParse(req.body ?? {});
    if (!form.success) {
      return sendValidationError(res, form.error);
    }

    try {
      const { question } = form.data;
      const model = form.data.model || DEFAULT_MODELS.visualQuestionAnswering;
      const answer = await pool.run(() => svc.multimodalVQA(image, question, model));
      res.json({ status: 'success', model, answer });
    } catch (error) {
      sendFailure(res, 'answering visual question', error);
    }
  });

  // Generic dispatch on (input_type, output_type)
  app.post('/any-to-any', upload.single('file'), async (req: Request, res: Response) => {
    const svc = requireService(res, service);
    if (!svc) return;

    const form = AnyToAnyFormSchema.safeParse(req.body ?? {});
    if (!form.success) {
      return sendValidationError(res, form.error);
    }
    const { input_type: inputType, output_type: outputType, model, text, question } = form.data;

    const payload = buildPayload(inputType, outputType, req.file?.buffer, text, question);
    if (!payload) {
      return sendError(res, 400, 'No valid payload provided');
    }

    try {
      const result = await pool.run(() => svc.anyToAny({ inputType, outputType, payload, model, question }));
      res.json({ status: 'success', result });
    } catch (error) {
      sendFailure(res, 'processing any-to-any request', error);
    }
  });
};
