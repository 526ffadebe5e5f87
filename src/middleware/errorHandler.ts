import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ConfigurationError } from '../lib/errors/sourcing-errors';

export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(message: string, statusCode: number) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }
}

const isDevelopment = () => process.env.NODE_ENV === 'development';

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  // Express only treats four-argument middleware as an error handler
  _next: NextFunction
) => {
  if (err instanceof ZodError) {
    return res.status(400).json({
      error: 'Validation failed',
      details: err.issues,
    });
  }

  console.error('Error:', err);

  if (err instanceof AppError) {
    return res.status(err.statusCode).json({
      error: err.message,
      ...(isDevelopment() && { stack: err.stack }),
    });
  }

  if (err instanceof ConfigurationError) {
    return res.status(503).json({
      error: err.message,
      key: err.key,
    });
  }

  res.status(500).json({
    error: 'Internal server error',
    ...(isDevelopment() && {
      message: err.message,
      stack: err.stack,
    }),
  });
};

export const notFound = (req: Request, res: Response) => {
  res.status(404).json({ error: 'Route not found' });
};
