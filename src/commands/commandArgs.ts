/**
 * Parsing of the command's `key=value` arguments into typed settings.
 *
 * @module
 */
import { z } from 'zod';
import { InvalidQueryConfiguration } from '../lib/errors';

const booleanArg = z
  .enum(['true', 'false', 't', 'f', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === 't' || value === '1' || value === 'yes');

function positiveIntArg(max: number) {
  return z
    .string()
    .regex(/^\d+$/, 'Expected a positive integer')
    .transform(Number)
    .pipe(z.number().int().min(1).max(max));
}

export const commandArgumentsSchema = z
  .object({
    eaddr: z.string().min(1),
    index: z.string().optional(),
    query: z.string().default('*'),
    tsfield: z.string().optional(),
    earliest: z.string().optional(),
    latest: z.string().optional(),
    fields: z
      .string()
      .optional()
      .transform((value) =>
        value === undefined
          ? undefined
          : value
              .split(',')
              .map((field) => field.trim())
              .filter(Boolean),
      ),
    action: z.enum(['indices-list', 'cluster-health']).optional(),
    limit: positiveIntArg(Number.MAX_SAFE_INTEGER).optional(),
    page_size: positiveIntArg(10000).optional(),
    include_es: booleanArg.default('false'),
    include_raw: booleanArg.default('false'),
    scan: booleanArg.default('true'),
    use_ssl: booleanArg.optional(),
    verify_certs: booleanArg.optional(),
  })
  .strict();

export type CommandArguments = z.output<typeof commandArgumentsSchema>;

function stripQuotes(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value.at(-1) === first) {
      return value.slice(1, -1);
    }
  }
  return value;
}

/**
 * Splits `key=value` tokens into a bag of strings. The value is everything
 * after the first `=`; one pair of surrounding quotes is removed. A repeated
 * key keeps its last value.
 *
 * @throws {InvalidQueryConfiguration} If a token has no `=` or an empty key.
 */
export function tokenizeArguments(tokens: readonly string[]): Record<string, string> {
  const bag = new Map<string, string>();
  for (const token of tokens) {
    const separator = token.indexOf('=');
    const key = separator > 0 ? token.slice(0, separator).trim() : '';
    if (!key) {
      throw new InvalidQueryConfiguration(`Malformed argument "${token}". Expected key=value.`);
    }
    bag.set(key, stripQuotes(token.slice(separator + 1)));
  }
  return Object.fromEntries(bag);
}

/** @throws {InvalidQueryConfiguration} On malformed tokens, unknown keys or invalid values. */
export function parseCommandArguments(tokens: readonly string[]): CommandArguments {
  const parsed = commandArgumentsSchema.safeParse(tokenizeArguments(tokens));
  if (parsed.success) {
    return parsed.data;
  }

  const issue = parsed.error.issues[0];
  const name = issue.path.join('.');
  if (issue.code === 'unrecognized_keys') {
    throw new InvalidQueryConfiguration(`Unknown argument(s): ${issue.keys.join(', ')}`);
  }
  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    throw new InvalidQueryConfiguration(`Missing required argument: ${name}`);
  }
  throw new InvalidQueryConfiguration(`Invalid value for ${name}: ${issue.message}`);
}
