import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { runWithRequestContext } from '../lib/requestContext';

const MAX_REQUEST_ID_LENGTH = 128;

function requestIdFrom(req: Request): string {
  const supplied = req.header('x-request-id') ?? req.header('x-correlation-id');
  const trimmed = supplied?.trim();
  return trimmed ? trimmed.slice(0, MAX_REQUEST_ID_LENGTH) : uuidv4();
}

export function requestContextMiddleware(req: Request, res: Response, next: NextFunction) {
  const requestId = requestIdFrom(req);
  req.requestId = requestId;
  res.setHeader('x-request-id', requestId);

  runWithRequestContext({ requestId, method: req.method, path: req.path }, () => next());
}
