import { z } from 'zod';

export const AskRequestSchema = z.object({
  question: z.string().refine(q => q.trim().length > 0, 'question must not be empty'),
  user_name: z.string().optional(),
  user_id: z.string().optional(),
});

export const SendRequestSchema = z.object({
  chat_id: z.string().min(1, 'chat_id must not be empty'),
  text: z.string(),
  reply_to_message_id: z.string().optional(),
  parse_mode: z.enum(['Markdown', 'HTML']).default('Markdown'),
  disable_web_page_preview: z.boolean().default(false),
});

export const BroadcastRequestSchema = z.object({
  chat_ids: z.array(z.string()),
  text: z.string(),
});

export type AskRequest = z.infer<typeof AskRequestSchema>;
export type SendRequest = z.infer<typeof SendRequestSchema>;
export type BroadcastRequest = z.infer<typeof BroadcastRequestSchema>;
