import { z } from "zod";

/**
 * Messages exchanged between the worker pool and chunk worker threads
 */

export const classificationRulesSchema = z.object({
  privateNetworks: z.array(z.string()),
  excludedNetworks: z.array(z.string()),
});

export const chunkWorkerDataSchema = z.object({
  rules: classificationRulesSchema,
});

export const chunkTaskSchema = z.object({
  id: z.number().int(),
  chunk: z.instanceof(Uint8Array),
});

export const chunkReplySchema = z.union([
  z.object({
    id: z.number().int(),
    result: z.object({
      privateIps: z.array(z.string()),
      publicIps: z.array(z.string()),
    }),
  }),
  z.object({
    id: z.number().int(),
    error: z.string(),
  }),
]);

export type ChunkWorkerData = z.infer<typeof chunkWorkerDataSchema>;
export type ChunkTask = z.infer<typeof chunkTaskSchema>;
export type ChunkReply = z.infer<typeof chunkReplySchema>;
