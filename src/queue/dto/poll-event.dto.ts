import { z } from 'zod';

/** Payload the reconciliation poller writes for one discovered commit. */
export const PollEventPayloadSchema = z.object({
  repository: z.object({
    owner: z.string().min(1),
    name: z.string().min(1),
    description: z.string().nullish(),
    language: z.string().nullish(),
    visibility: z.enum(['public', 'private']).nullish(),
    default_branch: z.string().nullish(),
  }),
  commit: z.object({
    hash: z.string().min(1),
    author: z.string(),
    author_email: z.string().nullable(),
    message: z.string(),
    committed_at: z.string(),
    branch: z.string().nullable(),
    changed_files: z.array(
      z.object({
        path: z.string(),
        change: z.enum(['added', 'modified', 'deleted', 'renamed']),
      }),
    ),
    metadata: z.record(z.unknown()).default({}),
  }),
});

export type PollEventPayload = z.input<typeof PollEventPayloadSchema>;
