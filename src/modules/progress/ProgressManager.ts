import { EventEmitter } from 'node:events';

export type ProgressStatus = 'running' | 'completed' | 'error';

export interface ProgressData {
  progress: number;
  message?: string;
  status?: ProgressStatus;
  error?: string;
}

export type ProgressCallback = (progress: number, message?: string) => void;

/** Process-wide progress of long-running tasks (imports), keyed by task id. */
export class ProgressManager {
    private static instance: ProgressManager | undefined;
    private readonly progressMap = new Map<string, ProgressData>();
    private readonly eventEmitter = new EventEmitter();

    private constructor() {}

    public static getInstance(): ProgressManager {
      if (!ProgressManager.instance) {
        ProgressManager.instance = new ProgressManager();
      }
      return ProgressManager.instance;
    }

    public startProgress(taskId: string, message?: string): void {
      this.updateProgress(taskId, { progress: 0, status: 'running', message, error: undefined });
    }

    public updateProgress(taskId: string, data: Partial<ProgressData>): void {
      const updatedData: ProgressData = {
        ...(this.progressMap.get(taskId) ?? { progress: 0, status: 'running' }),
        ...data,
      };

      this.progressMap.set(taskId, updatedData);
      this.eventEmitter.emit(`progress:${taskId}`, updatedData);
    }

    /** Callback form for services that report (progress, message) pairs. */
    public reporter(taskId: string): ProgressCallback {
      return (progress, message) => this.updateProgress(taskId, { progress, message });
    }

    public completeProgress(taskId: string, message?: string): void {
      this.updateProgress(taskId, { progress: 100, status: 'completed', message });
    }

    public errorProgress(taskId: string, error: string): void {
      this.updateProgress(taskId, { status: 'error', error });
    }

    public getProgress(taskId: string): ProgressData | undefined {
      return this.progressMap.get(taskId);
    }

    public subscribeToProgress(taskId: string, callback: (data: ProgressData) => void): () => void {
      const eventName = `progress:${taskId}`;
      this.eventEmitter.on(eventName, callback);
      return () => this.eventEmitter.removeListener(eventName, callback);
    }

    public subscriberCount(taskId: string): number {
      return this.eventEmitter.listenerCount(`progress:${taskId}`);
    }

    public clearProgress(taskId: string): void {
      this.progressMap.delete(taskId);
    }
}
