import type { Feedback } from "../types/plan";

import { RunLogError } from "../utils/errors";

export type FeedbackSink = (feedback: Feedback) => Promise<void>;

type RunLogOptions = {
  feedbackSink?: FeedbackSink;
};

export class RunLog {
  private readonly entries: Feedback[] = [];
  private readonly feedbackSink?: FeedbackSink;
  private feedbackSinkError: Error | null = null;
  private feedbackSinkQueue: Promise<void> = Promise.resolve();

  constructor(options?: RunLogOptions) {
    this.feedbackSink = options?.feedbackSink;
  }

  append(feedback: Feedback): void {
    if (this.entries.some((entry) => entry.attempt === feedback.attempt)) {
      throw new RunLogError(`Feedback for attempt ${feedback.attempt} is already recorded`);
    }

    const frozen: Feedback = Object.freeze({
      ...feedback,
      diagnostics: Object.freeze([...feedback.diagnostics]),
      executionResults: Object.freeze([...feedback.executionResults]),
      simulationResults: Object.freeze([...feedback.simulationResults]),
    });
    this.entries.push(frozen);
    this.enqueueFeedbackSink(frozen);
  }

  snapshot(): readonly Feedback[] {
    return [...this.entries];
  }

  get(attempt: number): Feedback | undefined {
    return this.entries.find((entry) => entry.attempt === attempt);
  }

  latest(): Feedback | undefined {
    return this.entries[this.entries.length - 1];
  }

  get size(): number {
    return this.entries.length;
  }

  async flush(): Promise<void> {
    await this.feedbackSinkQueue;
    if (this.feedbackSinkError) {
      throw this.feedbackSinkError;
    }
  }

  private enqueueFeedbackSink(feedback: Feedback): void {
    if (!this.feedbackSink) {
      return;
    }

    const sink = this.feedbackSink;
    this.feedbackSinkQueue = this.feedbackSinkQueue.then(async () => {
      try {
        await sink(feedback);
      } catch (error) {
        if (!this.feedbackSinkError) {
          this.feedbackSinkError =
            error instanceof Error
              ? error
              : new RunLogError(`Unknown feedback sink error: ${String(error)}`, error);
        }
      }
    });
  }
}
