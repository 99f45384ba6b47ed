import { z } from 'zod';
import { ParseError } from '../errors';

const byteCount = z.number().int().nonnegative();

/**
 * One change fact of a JSON lines record, as reported by the archive diff
 */
export const changeFactSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('modified'),
    added: byteCount.optional(),
    removed: byteCount.optional(),
  }),
  z.object({ type: z.literal('changed link') }),
  z.object({ type: z.literal('added'), size: byteCount.optional() }),
  z.object({ type: z.literal('removed'), size: byteCount.optional() }),
  z.object({ type: z.literal('added directory') }),
  z.object({ type: z.literal('removed directory') }),
  z.object({ type: z.literal('added link') }),
  z.object({ type: z.literal('removed link') }),
  z.object({
    type: z.literal('mode'),
    old_mode: z.string(),
    new_mode: z.string(),
  }),
  z.object({
    type: z.literal('owner'),
    old_user: z.string(),
    old_group: z.string(),
    new_user: z.string(),
    new_group: z.string(),
  }),
]);

export type ChangeFact = z.infer<typeof changeFactSchema>;
export type ChangeFactType = ChangeFact['type'];

export const CHANGE_FACT_TYPES: readonly ChangeFactType[] = changeFactSchema.options.map(
  (option) => option.shape.type.value
);

export const diffRecordSchema = z.object({
  path: z.string().trim().min(1),
  changes: z.array(z.unknown()).min(1),
});

export function isChangeFactType(value: string): value is ChangeFactType {
  return CHANGE_FACT_TYPES.some((type) => type === value);
}

/**
 * Validate one raw change fact. `source` is echoed in the error.
 */
export function parseChangeFact(raw: unknown, source: string): ChangeFact {
  const result = changeFactSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const type = typeof raw === 'object' && raw !== null && 'type' in raw ? raw.type : undefined;
  if (typeof type === 'string' && !isChangeFactType(type)) {
    throw new ParseError(`Unknown change type "${type}"`, source);
  }

  const issue = result.error.issues[0];
  throw new ParseError(`Malformed change (${issue ? issue.message : 'invalid'})`, source);
}
