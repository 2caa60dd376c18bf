import { z } from 'zod';

/**
 * GitHub push webhook, reduced to the fields the pipeline reads.
 * Unknown fields are ignored; missing required ones make the payload malformed.
 */
export const PushAuthorSchema = z.object({
  name: z.string().optional(),
  email: z.string().nullish(),
  username: z.string().optional(),
});

export const PushCommitSchema = z.object({
  id: z.string().min(1),
  message: z.string(),
  timestamp: z.string(),
  url: z.string().optional(),
  distinct: z.boolean().optional(),
  author: PushAuthorSchema,
  added: z.array(z.string()).default([]),
  modified: z.array(z.string()).default([]),
  removed: z.array(z.string()).default([]),
});

export const PushRepositorySchema = z.object({
  name: z.string().min(1),
  full_name: z.string().optional(),
  owner: z
    .object({
      login: z.string().optional(),
      name: z.string().optional(),
    })
    .optional(),
  description: z.string().nullish(),
  language: z.string().nullish(),
  private: z.boolean().optional(),
  default_branch: z.string().optional(),
});

export const PushPayloadSchema = z.object({
  ref: z.string().min(1),
  repository: PushRepositorySchema,
  commits: z.array(PushCommitSchema),
  pusher: z.object({ name: z.string().optional() }).optional(),
});

export type PushPayload = z.infer<typeof PushPayloadSchema>;
export type PushCommit = z.infer<typeof PushCommitSchema>;
export type PushRepository = z.infer<typeof PushRepositorySchema>;

/** GitHub pull_request webhook. The head commit is what the pipeline stores. */
export const PullRequestPayloadSchema = z.object({
  action: z.string(),
  number: z.number().int(),
  pull_request: z.object({
    title: z.string(),
    state: z.string().optional(),
    html_url: z.string().optional(),
    updated_at: z.string(),
    user: z.object({ login: z.string() }).optional(),
    head: z.object({ sha: z.string().min(1), ref: z.string() }),
    base: z.object({ sha: z.string().optional(), ref: z.string() }),
  }),
  repository: PushRepositorySchema,
});

export type PullRequestPayload = z.infer<typeof PullRequestPayloadSchema>;
