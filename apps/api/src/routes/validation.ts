import type { FastifyReply } from 'fastify';
import { z } from 'zod';

export interface ValidationErrorBody {
  error: string;
  details: z.ZodIssue[];
}

/** Parse `input` with `schema`, or answer 400 and return null. */
export function parseOrReply400<T extends z.ZodTypeAny>(
  reply: FastifyReply,
  schema: T,
  input: unknown,
  errorMessage: string = 'Invalid request',
): z.infer<T> | null {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const body: ValidationErrorBody = {
      error: errorMessage,
      details: parsed.error.issues,
    };
    reply.status(400).send(body);
    return null;
  }
  return parsed.data;
}
