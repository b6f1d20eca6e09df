import { z } from 'zod';

const receivedAt = () => new Date().toISOString();

export const MESSAGE_TYPES = ['text', 'image', 'video', 'audio', 'file', 'location'] as const;

export const SenderSchema = z.object({
  id: z.string().min(1),
  username: z.string().optional(),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
  language_code: z.string().optional(),
});

export const MessageSchema = z.object({
  message_id: z.string().min(1),
  from: SenderSchema,
  chat_id: z.string().min(1),
  text: z.string().optional(),
  message_type: z.enum(MESSAGE_TYPES).default('text'),
  timestamp: z.string().default(receivedAt),
  reply_to_message_id: z.string().optional(),
  metadata: z.record(z.unknown()).default({}),
});

const EventBase = {
  event_id: z.string().min(1),
  timestamp: z.string().default(receivedAt),
  data: z.record(z.unknown()).default({}),
};

export const InboundEventSchema = z.discriminatedUnion('event_type', [
  z.object({
    ...EventBase,
    event_type: z.literal('message'),
    message: MessageSchema,
  }),
  z.object({
    ...EventBase,
    event_type: z.enum(['message.delivered', 'message.read']),
    message: MessageSchema.optional(),
  }),
  z.object({
    ...EventBase,
    event_type: z.enum(['user.joined', 'user.left']),
    message: MessageSchema.optional(),
  }),
]);

export type Sender = z.infer<typeof SenderSchema>;
export type Message = z.infer<typeof MessageSchema>;
export type InboundEvent = z.infer<typeof InboundEventSchema>;
export type EventType = InboundEvent['event_type'];
