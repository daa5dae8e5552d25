import { z } from 'zod';

export const MAX_BATCH_TARGETS = 100;

/** Vendor push strategy, 0 through 4. */
export const PushStrategySchema = z.number().int().min(0).max(4);
export type PushStrategy = z.infer<typeof PushStrategySchema>;

export const ClickActionSchema = z
  .object({
    url: z.string().optional(),
    action: z.string().optional(),
    activity: z.string().optional()
  })
  .strict();

// Android only.
export const BadgeSchema = z
  .object({
    addNum: z.number().int().optional(),
    setNum: z.number().int().optional(),
    activity: z.string().optional()
  })
  .strict();

export const PushConfigSchema = z
  .object({
    clickAction: ClickActionSchema.optional(),
    badge: BadgeSchema.optional()
  })
  .strict();

export const PushMessageSchema = z.object({
  title: z.string().max(32),
  content: z.string().max(100),
  ext: z
    .record(z.unknown())
    .refine(value => Object.keys(value).length <= 10, {
      message: 'ext supports at most 10 keys'
    })
    .optional(),
  config: PushConfigSchema.optional()
});
export type PushMessage = z.infer<typeof PushMessageSchema>;

export interface PushRequest {
  strategy: PushStrategy;
  pushMessage: PushMessage;
}

export const TokenResponseSchema = z
  .object({
    application: z.string().optional(),
    access_token: z.string(),
    expires_in: z.number().nonnegative()
  })
  .passthrough();

export const PushSyncResultSchema = z
  .object({
    pushStatus: z.string(),
    data: z
      .object({
        result: z.string().optional(),
        msg_id: z.array(z.string()).optional()
      })
      .passthrough()
      .nullish()
  })
  .passthrough();

export const PushSingleResultSchema = z
  .object({
    pushStatus: z.string(),
    data: z.string().optional(),
    desc: z.string().optional()
  })
  .passthrough();

const pushResponseSchema = <T extends z.ZodTypeAny>(item: T) =>
  z
    .object({
      timestamp: z.number().optional(),
      duration: z.number().optional(),
      data: z.array(item).default([])
    })
    .passthrough();

export const PushSyncResponseSchema = pushResponseSchema(PushSyncResultSchema);
export type PushSyncResponse = z.infer<typeof PushSyncResponseSchema>;

export const PushSingleResponseSchema = pushResponseSchema(PushSingleResultSchema);
export type PushSingleResponse = z.infer<typeof PushSingleResponseSchema>;
