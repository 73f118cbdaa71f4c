/**
 * Progress tracking for image scans
 * Emits stage events that the CLI spinner (or any other listener) can follow
 */

export type ProgressStage =
  | 'decoding-event'
  | 'checking-cache'
  | 'creating-job'
  | 'running-job'
  | 'waiting-for-execution'
  | 'fetching-logs'
  | 'cleaning-up'
  | 'saving-results'
  | 'finished';

export interface ProgressEvent {
  stage: ProgressStage;
  message: string;
  image?: string;
  imagesDone?: number;
  totalImages?: number;
  timestamp: number;
}

export type ProgressListener = (event: ProgressEvent) => void;

export interface ProgressDetails {
  image?: string;
  imagesDone?: number;
  totalImages?: number;
}

export class ProgressTracker {
  private listeners: Set<ProgressListener> = new Set();
  private currentStage: ProgressStage | undefined;

  /**
   * Subscribe to progress events
   */
  subscribe(listener: ProgressListener): () => void {
    this.listeners.add(listener);
    // Return unsubscribe function
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(stage: ProgressStage, message: string, details?: ProgressDetails): void {
    this.currentStage = stage;

    const event: ProgressEvent = {
      stage,
      message,
      image: details?.image,
      imagesDone: details?.imagesDone,
      totalImages: details?.totalImages,
      timestamp: Date.now(),
    };

    // Emit to all listeners; listener errors never propagate
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        console.error('Progress listener error:', error);
      }
    }
  }

  getStage(): ProgressStage | undefined {
    return this.currentStage;
  }

  clear(): void {
    this.listeners.clear();
  }
}
