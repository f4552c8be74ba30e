/**
 * Converter Configuration
 *
 * Validated settings for a conversion run. Command-line values win over
 * environment variables, which win over the schema defaults.
 */

import { z } from 'zod';
import { ConfigurationError } from '../shared/errors/index.js';
import { LOG_LEVELS } from '../shared/services/logging.service.js';
import { DEFAULT_LINE_WIDTH } from '../renderer/core/constants.js';

/** Narrowest width the text renderer is allowed to wrap at */
export const MIN_LINE_WIDTH = 20;

export const ConverterConfigSchema = z.object({
  lineWidth: z
    .number()
    .int()
    .min(MIN_LINE_WIDTH)
    .default(DEFAULT_LINE_WIDTH)
    .describe('Wrap width for plain-text output'),
  strict: z.boolean().default(false).describe('Escape all text and close void elements in HTML output'),
  cssPaths: z
    .array(z.string().min(1))
    .optional()
    .describe('Stylesheets to apply; discovered beside the input when omitted'),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type ConverterConfig = z.infer<typeof ConverterConfigSchema>;

/**
 * Values supplied on the command line. Unvalidated until resolved.
 */
export interface ConfigOverrides {
  lineWidth?: number;
  strict?: boolean;
  cssPaths?: readonly string[];
  logLevel?: string;
}

export interface ConfigEnvironment {
  TEI_LINE_WIDTH?: string;
  TEI_STRICT?: string;
  LOG_LEVEL?: string;
}

function parseBoolean(value: string): boolean | string {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return value;
}

/**
 * Settings taken from the environment. Values that do not parse are passed
 * through unchanged so validation reports them.
 */
function fromEnvironment(env: ConfigEnvironment): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  if (env.TEI_LINE_WIDTH) {
    const width = Number(env.TEI_LINE_WIDTH);
    values.lineWidth = Number.isNaN(width) ? env.TEI_LINE_WIDTH : width;
  }
  if (env.TEI_STRICT) {
    values.strict = parseBoolean(env.TEI_STRICT);
  }
  if (env.LOG_LEVEL) {
    values.logLevel = env.LOG_LEVEL;
  }
  return values;
}

function definedEntries(args: ConfigOverrides): Record<string, unknown> {
  return Object.fromEntries(Object.entries(args).filter(([, value]) => value !== undefined));
}

/**
 * Merge and validate the configuration.
 *
 * @throws ConfigurationError listing every invalid setting
 */
export function resolveConfig(
  args: ConfigOverrides = {},
  env: ConfigEnvironment = process.env,
): ConverterConfig {
  const result = ConverterConfigSchema.safeParse({
    ...fromEnvironment(env),
    ...definedEntries(args),
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}
