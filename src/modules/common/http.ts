import { Response } from 'express';

import { errorMessage, RequestError } from './errors';

export function sendError(res: Response, error: unknown, message: string): void {
  if (error instanceof RequestError) {
    res.status(error.status).json({ message: error.message });
    return;
  }

  console.error(`${message}:`, error);
  res.status(500).json({ message, error: errorMessage(error) });
}
