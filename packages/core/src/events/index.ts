import type { FailureReason } from "../model/types.js";
import type { SkipReason } from "../state/types.js";

/** Pipeline event types */
export type PipelineEvent =
  | PipelineStartedEvent
  | PipelineCompletedEvent
  | PipelineFailedEvent
  | PipelineCanceledEvent
  | JobStartedEvent
  | JobSucceededEvent
  | JobFailedEvent
  | JobRetryingEvent
  | JobSkippedEvent
  | JobCanceledEvent
  | ArtifactsPublishedEvent
  | CacheRestoredEvent
  | CacheSavedEvent;

export interface PipelineStartedEvent {
  type: "pipeline_started";
  id: string;
  jobCount: number;
  stages: string[];
  timestamp: string;
}

export interface PipelineCompletedEvent {
  type: "pipeline_completed";
  id: string;
  durationMs: number;
  hasWarnings: boolean;
  timestamp: string;
}

export interface PipelineFailedEvent {
  type: "pipeline_failed";
  id: string;
  failedJobs: string[];
  durationMs: number;
  timestamp: string;
}

export interface PipelineCanceledEvent {
  type: "pipeline_canceled";
  id: string;
  durationMs: number;
  timestamp: string;
}

export interface JobStartedEvent {
  type: "job_started";
  name: string;
  stage: string;
  jobId: number;
  attempt: number;
  timestamp: string;
}

export interface JobSucceededEvent {
  type: "job_succeeded";
  name: string;
  attempt: number;
  durationMs: number;
  timestamp: string;
}

export interface JobFailedEvent {
  type: "job_failed";
  name: string;
  attempt: number;
  reason: FailureReason;
  exitCode: number | null;
  error: string | null;
  allowed: boolean;
  willRetry: boolean;
  timestamp: string;
}

export interface JobRetryingEvent {
  type: "job_retrying";
  name: string;
  attempt: number;
  delayMs: number;
  timestamp: string;
}

export interface JobSkippedEvent {
  type: "job_skipped";
  name: string;
  reason: SkipReason;
  timestamp: string;
}

export interface JobCanceledEvent {
  type: "job_canceled";
  name: string;
  timestamp: string;
}

export interface ArtifactsPublishedEvent {
  type: "artifacts_published";
  name: string;
  artifactId: string;
  fileCount: number;
  sizeBytes: number;
  timestamp: string;
}

export interface CacheRestoredEvent {
  type: "cache_restored";
  name: string;
  key: string;
  matchedKey: string | null;
  timestamp: string;
}

export interface CacheSavedEvent {
  type: "cache_saved";
  name: string;
  key: string;
  timestamp: string;
}

/** Event listener type */
export type EventListener = (event: PipelineEvent) => void;

/** Simple event emitter for pipeline events */
export class EventEmitter {
  private listeners: EventListener[] = [];
  private eventLog: PipelineEvent[] = [];

  on(listener: EventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  emit(event: PipelineEvent): void {
    this.eventLog.push(event);
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  getEvents(): readonly PipelineEvent[] {
    return this.eventLog;
  }
}
