import { z } from 'zod';
import { ConfigError } from './errors';
import { murmur3 } from './internal/hash';
import { RESERVED_AGGREGATORS } from './internal/constants';
import { getLogger } from './logger';

// ===== Collection type configuration =====

const callable = z.custom<(...args: never[]) => unknown>((value) => typeof value === 'function', {
  message: 'Expected a function',
});

export const AggregatorSchema = z.object({
  identity: callable,
  lift: callable,
  combine: callable,
  equals: callable.optional(),
});

export const CollectionConfigSchema = z
  .object({
    name: z.string().trim().min(1),
    compare: callable,
    identify: callable.optional(),
    hash: callable.optional(),
    salt: z.number().int().min(0).max(0xffffffff).optional(),
    aggregators: z.record(AggregatorSchema).default({}),
    intern: z.boolean().default(true),
    elementEquals: callable.optional(),
  })
  .superRefine((config, ctx) => {
    for (const name of Object.keys(config.aggregators)) {
      if (RESERVED_AGGREGATORS.includes(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['aggregators', name],
          message: `"${name}" is computed by every collection and cannot be redefined`,
        });
      }
    }
  });

export const DuplicatePolicySchema = z.union([z.literal('replace'), z.literal('reject'), callable], {
  errorMap: () => ({ message: 'Expected "replace", "reject" or a merge function' }),
});

const MAP_DIGESTS: readonly string[] = ['keySum', 'valSum'];

export const MapConfigSchema = z
  .object({
    onDuplicate: DuplicatePolicySchema,
    aggregators: z.record(z.unknown()).default({}),
  })
  .superRefine((config, ctx) => {
    for (const name of Object.keys(config.aggregators)) {
      if (MAP_DIGESTS.includes(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['aggregators', name],
          message: `"${name}" is computed by every map and cannot be redefined`,
        });
      }
    }
  });

export interface ResolvedSettings {
  name: string;
  salt: number;
  intern: boolean;
}

function parse<S extends z.ZodTypeAny>(schema: S, input: unknown, subject: string): z.output<S> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  const issues = result.error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  getLogger().warn({ issues }, `rejected ${subject} configuration`);
  throw new ConfigError(
    `Invalid ${subject} configuration: ${issues.map((i) => `${i.path || '<root>'}: ${i.message}`).join('; ')}`,
    issues,
    result.error,
  );
}

/**
 * Validate a collection configuration once, at type definition. Function
 * fields are checked for presence and kind only; the caller keeps its typed
 * references to them.
 */
export function resolveSettings(config: unknown): ResolvedSettings {
  const { name, salt, intern } = parse(CollectionConfigSchema, config, 'collection');
  return { name, salt: salt ?? murmur3(name), intern };
}

// Map-only fields; the rest is checked by `resolveSettings`
export function checkMapSettings(config: unknown): void {
  parse(MapConfigSchema, config, 'map');
}
