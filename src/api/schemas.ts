import { z } from 'zod';

export const AttachmentSchema = z.object({
  name: z.string().min(1),
  url: z.string().min(1)
});

export const TaskSubmissionSchema = z.object({
  email: z.string().email(),
  secret: z.string(),
  task: z.string().min(1),
  round: z.number().int().min(0),
  nonce: z.string(),
  brief: z.string().nullish().transform((v) => v ?? undefined),
  checks: z.array(z.string()).nullish().transform((v) => v ?? []),
  evaluation_url: z.string().url(),
  attachments: z.array(AttachmentSchema).nullish().transform((v) => v ?? [])
});

export type TaskSubmissionBody = z.infer<typeof TaskSubmissionSchema>;
