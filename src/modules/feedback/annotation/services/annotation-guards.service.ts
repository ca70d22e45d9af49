import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { FeedbackSettings } from '../../../../config/configuration';

type ReleaseFn = () => void;

// Bounds how many units talk to the model at the same time.
@Injectable()
export class AnnotationGuardsService {
  private readonly maxConcurrency: number;
  private readonly queue: Array<(release: ReleaseFn) => void> = [];
  private inFlight = 0;

  constructor(private readonly configService: ConfigService) {
    const { maxConcurrency } =
      this.configService.getOrThrow<FeedbackSettings>('feedback');
    this.maxConcurrency = Math.max(1, maxConcurrency);
  }

  get limit() {
    return this.maxConcurrency;
  }

  async acquire(): Promise<ReleaseFn> {
    if (this.inFlight < this.maxConcurrency) {
      this.inFlight += 1;
      return this.createRelease();
    }
    return new Promise((resolve) => {
      this.queue.push(resolve);
    });
  }

  async withSlot<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private createRelease(): ReleaseFn {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.inFlight = Math.max(0, this.inFlight - 1);
      const next = this.queue.shift();
      if (next) {
        this.inFlight += 1;
        next(this.createRelease());
      }
    };
  }
}
