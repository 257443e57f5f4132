import { z } from "zod";

export const ErrorBodySchema = z.strictObject({
  error: z.string().min(1),
});

export type ErrorBody = z.infer<typeof ErrorBodySchema>;
