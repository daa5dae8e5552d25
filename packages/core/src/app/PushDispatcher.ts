import { PushJobSchema } from '../domain/events';
import type { PushJob } from '../domain/events';
import { MAX_BATCH_TARGETS } from '../domain/models';
import type { PushRequest, PushSingleResponse, PushSyncResponse } from '../domain/models';
import type { PushClient } from '../ports/PushClient';

export interface DispatcherLogger {
  debug(message: string, context?: Record<string, unknown>): void;
}

export type DispatchResult =
  | { mode: 'sync'; target: string; response: PushSyncResponse }
  | { mode: 'batch'; batches: Array<{ targets: string[]; response: PushSingleResponse }> };

export class InvalidPushJobError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid push job: ${issues.join('; ')}`);
    this.name = 'InvalidPushJobError';
    this.issues = issues;
  }
}

export const chunkTargets = (targets: string[], size = MAX_BATCH_TARGETS): string[][] => {
  const chunks: string[][] = [];
  for (let i = 0; i < targets.length; i += size) {
    chunks.push(targets.slice(i, i + size));
  }
  return chunks;
};

export class PushDispatcher {
  constructor(
    private readonly client: PushClient,
    private readonly logger?: DispatcherLogger
  ) {}

  parseJob(input: unknown): PushJob {
    const parsed = PushJobSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidPushJobError(
        parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      );
    }
    return parsed.data;
  }

  async dispatch(input: unknown, signal?: AbortSignal): Promise<DispatchResult> {
    const job = this.parseJob(input);
    const request: PushRequest = { strategy: job.strategy, pushMessage: job.message };

    if (job.mode === 'sync') {
      const [target] = job.targets;
      const response = await this.client.pushSync(target, request, signal);
      return { mode: 'sync', target, response };
    }

    // Batches go out in order; a failure stops the remaining ones.
    const batches: Array<{ targets: string[]; response: PushSingleResponse }> = [];
    const chunks = chunkTargets(job.targets);
    for (const [index, targets] of chunks.entries()) {
      this.logger?.debug('Sending push batch', {
        batch: index + 1,
        batches: chunks.length,
        targets: targets.length
      });
      const response = await this.client.pushSingle(targets, request, signal);
      batches.push({ targets, response });
    }
    return { mode: 'batch', batches };
  }
}
