import { z } from 'zod';

export const PLACEHOLDER_ACCESS_TOKEN = 'your_access_token_here';

/** Longest delay a Node timer accepts; larger values fire immediately */
export const MAX_MEMBER_TIMEOUT_MS = 2_147_483_647;

export const TeamSearchConfigSchema = z.object({
  version: z.string().default('0.1.0'),
  search: z.object({
    keywords: z.array(z.string()).default([]),
    extensions: z.array(z.string()).default([]),
    concurrency: z.number().int().min(1).max(20).default(3),
    memberTimeoutMs: z.number().int().positive().max(MAX_MEMBER_TIMEOUT_MS).default(600_000),
    includeSharedFolders: z.boolean().default(true),
  }).default({}),
  retry: z.object({
    maxAttempts: z.number().int().min(1).max(10).default(5),
    baseDelayMs: z.number().int().min(0).max(60_000).default(2000),
  }).default({}),
  download: z.object({
    directory: z.string().min(1).default('downloads'),
  }).default({}),
});

export type TeamSearchConfig = z.infer<typeof TeamSearchConfigSchema>;
