export interface JobHandle {
  readonly jobId: string;
  /** Settles once the job has reached a terminal state. Never rejects. */
  readonly done: Promise<void>;
  cancel(): void;
}
