import { z } from 'zod';

const isSinglePathSegment = (name: string): boolean =>
  !/[/\\\0]/.test(name) && name !== '.' && name !== '..';

/**
 * Schema for the data fields of `NamespaceOptions`.
 */
export const namespaceOptionsSchema = z.object({
  appName: z
    .string()
    .min(1, 'appName must not be empty')
    .refine(isSinglePathSegment, 'appName must be a single path segment'),
  defaultTtlSeconds: z
    .number()
    .finite('defaultTtlSeconds must be finite')
    .nonnegative('defaultTtlSeconds must be >= 0')
    .optional(),
  cacheDir: z.string().min(1, 'cacheDir must not be empty').optional(),
});

/**
 * Formats zod issues as a single line.
 */
export const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
