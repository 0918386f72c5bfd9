import { EventEmitter } from "node:events";

export type TaskContext<TPayload, TProgress> = {
  id: string;
  payload: TPayload;
  reportProgress: (progress: TProgress) => void;
};

export type TaskWorker<TPayload, TResult, TProgress> = (
  context: TaskContext<TPayload, TProgress>
) => Promise<TResult>;

export type TaskItem<TPayload> = {
  id: string;
  payload: TPayload;
};

export type TaskEvent<TResult, TProgress> =
  | { type: "queued"; taskId: string }
  | { type: "start"; taskId: string }
  | { type: "progress"; taskId: string; progress: TProgress }
  | { type: "done"; taskId: string; result: TResult }
  | { type: "error"; taskId: string; message: string }
  | { type: "idle" };

/**
 * Runs submitted tasks one at a time, in submission order, off the caller's
 * flow. Progress and completion arrive as events.
 */
export class TaskQueue<TPayload, TResult, TProgress = never> {
  private readonly worker: TaskWorker<TPayload, TResult, TProgress>;

  private readonly emitter = new EventEmitter();

  private readonly pending: Array<TaskItem<TPayload>> = [];

  private active: string | null = null;

  constructor(worker: TaskWorker<TPayload, TResult, TProgress>) {
    this.worker = worker;
  }

  get busy(): boolean {
    return this.active !== null || this.pending.length > 0;
  }

  onEvent(listener: (event: TaskEvent<TResult, TProgress>) => void): () => void {
    this.emitter.on("event", listener);
    return () => this.emitter.off("event", listener);
  }

  enqueue(items: Array<TaskItem<TPayload>>): void {
    for (const item of items) {
      this.pending.push(item);
      this.emit({ type: "queued", taskId: item.id });
    }
    this.drain();
  }

  private drain(): void {
    if (this.active !== null) {
      return;
    }
    const next = this.pending.shift();
    if (!next) {
      this.emit({ type: "idle" });
      return;
    }
    this.run(next);
  }

  private run(item: TaskItem<TPayload>): void {
    this.active = item.id;
    this.emit({ type: "start", taskId: item.id });

    void this.worker({
      id: item.id,
      payload: item.payload,
      reportProgress: (progress) => {
        this.emit({ type: "progress", taskId: item.id, progress });
      }
    })
      .then((result) => {
        this.emit({ type: "done", taskId: item.id, result });
      })
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : "Unknown queue error";
        this.emit({ type: "error", taskId: item.id, message });
      })
      .finally(() => {
        this.active = null;
        this.drain();
      });
  }

  private emit(event: TaskEvent<TResult, TProgress>): void {
    this.emitter.emit("event", event);
  }
}
