import { Request, Response } from 'express';

import { ProgressData, ProgressManager } from './ProgressManager';

function isFinished(data: ProgressData): boolean {
  return data.status === 'completed' || data.status === 'error';
}

/** Streams a task's progress as server-sent events until the run in progress completes or fails. */
export const progressMiddleware = (req: Request, res: Response) => {
  const taskId = req.params.taskId;
  const progressManager = ProgressManager.getInstance();

  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.flushHeaders();

  const send = (data: ProgressData) => res.write(`data: ${JSON.stringify(data)}\n\n`);

  // A finished record belongs to an earlier run; wait for the next one instead
  const currentProgress = progressManager.getProgress(taskId);
  if (currentProgress && !isFinished(currentProgress)) {
    send(currentProgress);
  }

  const unsubscribe = progressManager.subscribeToProgress(taskId, (data) => {
    send(data);
    if (isFinished(data)) {
      unsubscribe();
      res.end();
    }
  });

  res.on('close', unsubscribe);
};
