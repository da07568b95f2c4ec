import { z } from 'zod';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';

// Options shared by every target preparer.
export const baseTargetPreparerSchema = z.object({
  'disable': z.boolean().default(false),
  'disable-tear-down': z.boolean().default(false),
});

export interface BaseTargetPreparerOptions {
  disable: boolean;
  disableTearDown: boolean;
}

export function baseOptionsFrom(raw: z.output<typeof baseTargetPreparerSchema>): BaseTargetPreparerOptions {
  return {
    disable: raw['disable'],
    disableTearDown: raw['disable-tear-down'],
  };
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validates raw option values (as injected from the invocation config)
 * against a plugin's schema.
 */
export function parseOptions<S extends z.ZodTypeAny>(
  alias: string,
  schema: S,
  raw: unknown
): z.output<S> {
  const result = schema.safeParse(raw ?? {});
  if (!result.success) {
    throw new HarnessError(
      HarnessErrorCode.CONFIG_ERROR,
      `Invalid options for ${alias}: ${formatIssues(result.error)}`,
      { alias, issues: result.error.issues }
    );
  }
  return result.data;
}
