import { z } from 'zod';

export const jobDictSchema = z.object({
  map_function_handle: z.record(z.unknown()),
  reduce_function_handle: z.record(z.unknown()),
  guid: z.string().optional(),
});

export type HandleDict = { [key: string]: unknown };

export type JobDict = {
  map_function_handle: HandleDict;
  reduce_function_handle: HandleDict;
  guid: string;
};
