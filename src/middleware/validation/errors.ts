import type { Request, Response, NextFunction } from 'express';
import { getRequestContext } from '../../lib/requestContext';
import { CatalogLoadError } from '../../services/catalogLoader.service';

export type ErrorResponse = { status: number; body: Record<string, unknown> };

export type ErrorHandlerMap = Record<string, (error: Error) => ErrorResponse>;

/**
 * Create a standardized error response
 */
export function createErrorResponse(status: number, message: string, details?: unknown): ErrorResponse {
  return { status, body: { error: message, ...(details !== undefined && { details }) } };
}

/**
 * Higher-order function to create async error handling middleware.
 * Errors whose message is a known code are mapped to HTTP responses.
 */
export function asyncErrorHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
  errorMap?: ErrorHandlerMap
) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      await handler(req, res, next);
    } catch (error) {
      if (error instanceof Error && errorMap?.[error.message]) {
        const mapped = errorMap[error.message](error);
        return res.status(mapped.status).json(mapped.body);
      }

      const context = getRequestContext();
      console.error(
        JSON.stringify({
          event: 'http_unhandled_error',
          requestId: context?.requestId,
          method: context?.method,
          path: context?.path,
          message: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined
        })
      );
      return res.status(500).json({
        error: 'An internal server error occurred.',
        ...(process.env.NODE_ENV === 'development' && error instanceof Error && { details: error.message })
      });
    }
  };
}

function catalogErrorResponse(error: Error): ErrorResponse {
  if (error instanceof CatalogLoadError) {
    return {
      status: 422,
      body: {
        error: 'Catalog documents are invalid.',
        code: error.code,
        schemaVersion: error.schemaVersion,
        issues: error.issues
      }
    };
  }
  return createErrorResponse(422, 'Catalog documents are invalid.');
}

/**
 * Service error mappings for purchase planning
 */
export const planningErrorMap: ErrorHandlerMap = {
  CATALOG_INVALID: catalogErrorResponse,
  CATALOG_FILE_MISSING: catalogErrorResponse,
  PLAN_MONTH_LOCKED: () => createErrorResponse(409, 'Orders before the editable cutoff month cannot be adjusted.'),
  PLAN_ROW_NOT_FOUND: () => createErrorResponse(404, 'No plan row exists for that item and month.')
};
