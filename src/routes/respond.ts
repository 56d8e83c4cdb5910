import type { Response } from 'express';
import type { ZodError } from 'zod';
import { ConfigurationError, messageOf, statusCodeFor } from '../errors';
import { requestIdOf } from '../middleware/requestId';
import type { HuggingService } from '../services/huggingService';

export const sendError = (res: Response, status: number, detail: string) =>
  res.status(status).json({ status, detail });

export const sendValidationError = (res: Response, error: ZodError) => {
  const issue = error.issues[0];
  const detail = issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'Invalid request';
  return sendError(res, 400, detail);
};

export const sendFailure = (res: Response, context: string, error: unknown) => {
  console.error(`Error ${context} [request ${requestIdOf(res)}]:`, error);
  return sendError(res, statusCodeFor(error), messageOf(error));
};

/** Answers 500 and returns null while the server runs without HF_TOKEN */
export const requireService = (res: Response, service: HuggingService | null): HuggingService | null => {
  if (!service) {
    sendError(res, 500, new ConfigurationError().message);
    return null;
  }
  return service;
};

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on', 't', 'y']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off', 'f', 'n', '']);

export const parseFormBoolean = (value: unknown): boolean | undefined => {
  if (typeof value === 'boolean') return value;
  if (value === undefined || value === null) return false;
  if (typeof value !== 'string') return undefined;

  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return undefined;
};
