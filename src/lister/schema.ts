import { z } from 'zod';

export const ItemId = z.union([z.number().int(), z.string().min(1)]);

export const Column = z.object({
  id: ItemId,
  title: z.string(),
  // Type tags are owned by Smartsheet; any tag it returns is passed through.
  type: z.string().min(1),
});

export type Column = z.infer<typeof Column>;

export const Sheet = z.object({
  id: ItemId.optional(),
  name: z.string(),
  columns: z.array(Column).default([]),
});

export type Sheet = z.infer<typeof Sheet>;
