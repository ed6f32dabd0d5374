import { z } from 'zod';

export const historySchema = z.object({
  urls: z.array(z.string()),
  position: z.number().int().min(-1)
});

export const sessionSnapshotSchema = z.object({
  version: z.number(),
  savedAt: z.number(),
  activeIndex: z.number().int().min(-1),
  tabs: z.array(z.object({ history: historySchema }))
});
