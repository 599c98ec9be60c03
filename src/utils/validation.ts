import { z } from 'zod';
import { createError } from '../middleware/error.middleware';

const nameList = z.array(z.string()).max(100);

export const patientContextSchema = z.object({
  age: z.number().int().min(0).max(130).nullable().optional(),
  gender: z.string().max(50).nullable().optional(),
  conditions: nameList.optional(),
  medications: nameList.optional(),
  allergies: nameList.optional(),
});

export const updateProfileSchema = patientContextSchema;

export const searchRequestSchema = z.object({
  query: z.string({
    required_error: 'Query is required',
    invalid_type_error: 'Query must be a string',
  }),
  patientContext: patientContextSchema.optional(),
  useProfile: z.boolean().optional(),
});

export const interactionCheckSchema = z.object({
  medications: z.array(z.string(), {
    required_error: 'Medications are required',
    invalid_type_error: 'Medications must be an array of strings',
  }),
});

export const parseBody = <T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> => {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw createError(field ? `${field}: ${issue.message}` : issue.message, 400);
  }
  return result.data;
};
