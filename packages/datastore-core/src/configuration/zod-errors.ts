import type { ZodError } from 'zod';
import { ConfigError } from '@graphdex/support';

/**
 * Convert a zod validation failure into a ConfigError listing every problem.
 */
export function configErrorFrom(error: ZodError, description: string): ConfigError {
  const problems = error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    const detail = issue.code === 'unrecognized_keys' ? `unknown keys: ${issue.keys.join(', ')}` : issue.message;
    return `  - ${location}: ${detail}`;
  });

  return new ConfigError(`Invalid ${description}:\n${problems.join('\n')}`, { cause: error });
}
