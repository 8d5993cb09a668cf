import { z } from 'zod';

const ChatSchema = z
  .object({
    id: z.number(),
    type: z.string(),
  })
  .passthrough();

const UserSchema = z
  .object({
    id: z.number(),
    first_name: z.string().optional(),
    username: z.string().optional(),
  })
  .passthrough();

export const TelegramMessageSchema = z
  .object({
    message_id: z.number(),
    chat: ChatSchema,
    from: UserSchema.optional(),
    author_signature: z.string().optional(),
    text: z.string().optional(),
  })
  .passthrough();

export const TelegramUpdateSchema = z
  .object({
    update_id: z.number(),
    message: TelegramMessageSchema.optional(),
    channel_post: TelegramMessageSchema.optional(),
  })
  .passthrough();

export const TelegramUpdateListSchema = z.array(TelegramUpdateSchema);

export const TelegramEnvelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

export type TelegramMessage = z.infer<typeof TelegramMessageSchema>;
export type TelegramUpdate = z.infer<typeof TelegramUpdateSchema>;

export type TelegramUpdateKind = 'message' | 'channel_post';

export const HANDLED_UPDATE_KINDS: readonly TelegramUpdateKind[] = ['message', 'channel_post'];
