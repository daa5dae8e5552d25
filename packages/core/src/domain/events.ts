import { z } from 'zod';
import { PushMessageSchema, PushStrategySchema } from './models';

export const PushJobSchema = z
  .object({
    mode: z.enum(['sync', 'batch']).default('batch'),
    targets: z.array(z.string().min(1)).min(1),
    strategy: PushStrategySchema.default(0),
    message: PushMessageSchema
  })
  .superRefine((job, ctx) => {
    if (job.mode === 'sync' && job.targets.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['targets'],
        message: 'sync pushes take exactly one target'
      });
    }
  });

export type PushJob = z.infer<typeof PushJobSchema>;
