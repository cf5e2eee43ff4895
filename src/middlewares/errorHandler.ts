import type { Request, Response, NextFunction } from 'express';
import { AppError } from '../utils/errors';

// body-parser marks malformed JSON with status 400 and type "entity.parse.failed"
const isBodyParseError = (error: unknown): boolean =>
  error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';

const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  if (error instanceof AppError) {
    res.status(error.statusCode).json({
      success: false,
      error: error.message,
      code: error.code,
      ...(error.details === undefined ? {} : { details: error.details }),
    });
    return;
  }

  if (isBodyParseError(error)) {
    res.status(400).json({ success: false, error: 'Malformed JSON body', code: 'INVALID_JSON' });
    return;
  }

  console.error(`❌ ${req.method} ${req.originalUrl} failed:`, error);
  res.status(500).json({ success: false, error: 'Internal server error', code: 'INTERNAL' });
};

export default errorHandler;

export const notFound = (req: Request, res: Response): void => {
  res.status(404).json({ success: false, error: `Route ${req.method} ${req.path} not found`, code: 'NOT_FOUND' });
};
