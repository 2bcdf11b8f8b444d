import type { z, ZodType } from "zod";

export interface ToolDefinition<
  TParams extends ZodType = ZodType,
  TResult = unknown,
> {
  name: string;
  description: string;
  parameters: TParams;
  execute: (params: z.infer<TParams>) => Promise<TResult>;
}
