import { z } from 'zod';
import { extractErrorDetails } from '../errors/base.js';
import { OutlineParseError } from '../errors/service.js';
import type { Forest, Tree } from '../entities/Tree.js';
import { fail, succeed, type OperationResult } from '../types/result.js';

// One outline row as persisted: a stable id plus the text the UI renders
export const outlineItemSchema = z.object({
  id: z.string().min(1, 'Outline item id must not be empty'),
  title: z.string(),
});

export type OutlineItem = z.infer<typeof outlineItemSchema>;

export type OutlineTree = Tree<OutlineItem>;

/**
 * Recursive outline structure with children
 */
export const outlineTreeSchema: z.ZodType<OutlineTree> = z.lazy(() =>
  z.object({
    value: outlineItemSchema,
    children: z.array(outlineTreeSchema),
  })
);

export const outlineForestSchema = z.array(outlineTreeSchema);

export const outlineKey = (item: OutlineItem): string => item.id;

/**
 * Validate untrusted outline data into a forest
 */
export function parseOutlineForest(
  data: unknown
): OperationResult<Forest<OutlineItem>, OutlineParseError> {
  const result = outlineForestSchema.safeParse(data);

  if (result.success) {
    return succeed(result.data);
  }

  const validationErrors = result.error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
  const summary = validationErrors.map((err) => `${err.field}: ${err.message}`).join(', ');

  return fail(new OutlineParseError(`Invalid outline: ${summary}`, validationErrors));
}

export function parseOutlineJson(
  text: string
): OperationResult<Forest<OutlineItem>, OutlineParseError> {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const { message } = extractErrorDetails(error);
    return fail(new OutlineParseError(`Outline is not valid JSON: ${message}`, []));
  }
  return parseOutlineForest(data);
}
