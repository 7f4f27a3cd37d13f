import { z } from 'zod';

export const LogLevelSchema = z.enum([
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent'
]);

/**
 * Environment variables read by {@link resolveEditorConfig}.
 *
 * Empty strings count as unset.
 */
export const EditorEnvSchema = z.object({
  VALUES_FILE: z.string().min(1).default('values.yaml'),
  DESCRIPTOR_FILE: z.string().min(1).default('descriptor.yaml'),
  LOG_LEVEL: LogLevelSchema.default('info'),
  LOG_FORMAT: z.enum(['json', 'text']).default('json')
});

export type EditorConfig = {
  /** Path of the values document (YAML). */
  valuesPath: string;

  /** Path of the descriptor document (YAML or JSON). */
  descriptorPath: string;

  log: {
    level: z.infer<typeof LogLevelSchema>;
    format: 'json' | 'text';
  };
};

/**
 * Resolves the editor configuration from environment variables.
 *
 * @param env - Variables to read, `process.env` by default
 * @returns The validated configuration with defaults applied
 * @throws Error naming the first invalid variable
 */
export function resolveEditorConfig(
  env: Readonly<Record<string, string | undefined>> = process.env
): EditorConfig {
  const input = Object.fromEntries(
    Object.keys(EditorEnvSchema.shape).map(name => [
      name,
      env[name] === '' ? undefined : env[name]
    ])
  );

  const result = EditorEnvSchema.safeParse(input);
  if (!result.success) {
    const [issue] = result.error.issues;
    const variable = issue?.path.join('.') ?? 'environment';
    throw new Error(
      `Invalid configuration in ${variable}: ${issue?.message ?? result.error.message}`
    );
  }

  return {
    valuesPath: result.data.VALUES_FILE,
    descriptorPath: result.data.DESCRIPTOR_FILE,
    log: {
      level: result.data.LOG_LEVEL,
      format: result.data.LOG_FORMAT
    }
  };
}
