import type { StandardSchemaV1 } from '@standard-schema/spec';

/**
 * Validates a document using a Standard Schema V1 compliant validator.
 *
 * The `~standard` property is the universal adapter defined by the Standard
 * Schema V1 specification, so the loader works with Zod, Valibot, ArkType
 * and others without library-specific code.
 *
 * About the result:
 * - `~standard.validate` returns `{ value }` or `{ issues }` and does not
 *   throw. This function turns the first issue into an `Error`.
 * - Loading is a one-shot operation, but the merge and synthesis engines that
 *   consume the result are synchronous; async validators are rejected to keep
 *   the contract simple.
 *
 * @template S - The specific schema type.
 *
 * @param schema - The schema instance (must contain `~standard`).
 * @param input - The raw parsed document.
 * @param documentName - Name used in error messages (e.g. a file path).
 * @returns The validated (and potentially transformed) document.
 *
 * @throws
 * - If the schema object is invalid (missing `~standard`).
 * - If the validator returns a Promise.
 * - If validation fails.
 */
export function validateWithSchema<S extends StandardSchemaV1>(
  schema: S,
  input: unknown,
  documentName: string
): StandardSchemaV1.InferOutput<S> {
  // Guards against plain objects being passed where a schema is expected.
  if (!('~standard' in schema)) {
    throw new Error(
      `The schema for "${documentName}" is invalid. Expected an object with the "~standard" property (e.g. Zod, Valibot), but received a plain object.`
    );
  }

  const result = schema['~standard'].validate(input);

  if (result instanceof Promise) {
    throw new Error(
      `Async schema validation is not supported for "${documentName}".`
    );
  }

  const [firstIssue] = result.issues ?? [];
  if (firstIssue) {
    throw new Error(
      `Invalid document "${documentName}" at "${formatIssuePath(firstIssue)}": ${firstIssue.message}`
    );
  }

  if (result.issues === undefined) {
    return result.value;
  }

  // An empty `issues` array carries no `value`; treat it as a failed result.
  throw new Error(
    `Invalid document "${documentName}": the validator reported failure without issues.`
  );
}

/**
 * Joins an issue path for display (`["titles", "image.tag"]` ->
 * `titles.image.tag`). Standard Schema allows path segments to be wrapped
 * in `{ key }` objects.
 */
function formatIssuePath(issue: StandardSchemaV1.Issue): string {
  if (!issue.path || issue.path.length === 0) return '<root>';

  return issue.path
    .map(segment =>
      typeof segment === 'object' ? String(segment.key) : String(segment)
    )
    .join('.');
}
