import type { Request, Response, NextFunction } from 'express';

type RequestLogEntry = {
  event: 'http_request';
  requestId?: string;
  method: string;
  path: string;
  status: number;
  durationMs: number;
  bytesIn: number;
  bytesOut: number;
  userAgent?: string;
  timestamp: string;
};

export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  const bytesIn = Number(req.headers['content-length'] ?? 0);

  res.on('finish', () => {
    const entry: RequestLogEntry = {
      event: 'http_request',
      requestId: req.requestId,
      method: req.method,
      path: req.path,
      status: res.statusCode,
      durationMs: Date.now() - start,
      bytesIn,
      bytesOut: Number(res.getHeader('content-length') ?? 0),
      userAgent: req.header('user-agent') ?? undefined,
      timestamp: new Date().toISOString()
    };

    console.log(JSON.stringify(entry));
  });

  next();
}
