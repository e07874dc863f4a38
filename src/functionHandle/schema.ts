import { z } from 'zod';

export const moduleToLoadDictSchema = z.object({
  href: z.string().min(1).optional(),
  filename: z.string().min(1).optional(),
}).refine((module) => (module.href === undefined) !== (module.filename === undefined), {
  message: 'exactly one of href and filename is required',
});

export const functionHandleDictSchema = z.object({
  function_name: z.string().min(1),
  modules_to_load: z.array(moduleToLoadDictSchema).nullish(),
  options: z.record(z.unknown()).optional(),
});

export type ModuleToLoadDict = { href: string } | { filename: string };

export type FunctionHandleOptions = { [key: string]: unknown };

export type FunctionHandleDict = {
  function_name: string;
  modules_to_load: ModuleToLoadDict[];
  options?: FunctionHandleOptions;
};
