/**
 * YAML parsing and serialization utilities.
 */
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import { SystemError, ErrorCodes } from './errors.js';
import { readFile, readFileSync } from './file-system.js';

/**
 * Parse YAML content into an untyped value.
 */
export function parseYaml(content: string): unknown {
  try {
    return parse(content);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse YAML: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { error }
    );
  }
}

/**
 * Parse and validate YAML content with a Zod schema.
 */
export function parseYamlWithSchema<T extends z.ZodType>(
  content: string,
  schema: T
): z.infer<T> {
  const parsed = parseYaml(content);
  const result = schema.safeParse(parsed);

  if (!result.success) {
    throw new SystemError(
      ErrorCodes.SCHEMA_VIOLATION,
      `YAML validation failed: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }

  return result.data;
}

function withFileContext(error: unknown, filePath: string): SystemError {
  if (error instanceof SystemError) {
    return new SystemError(
      error.code,
      `${error.message} (file: ${filePath})`,
      { ...error.details, filePath }
    );
  }
  return new SystemError(
    ErrorCodes.FILE_READ_ERROR,
    `Failed to load YAML file: ${filePath}${error instanceof Error ? ` (${error.message})` : ''}`,
    { filePath, error }
  );
}

/**
 * Load and validate a YAML file with a Zod schema.
 */
export async function loadYamlWithSchema<T extends z.ZodType>(
  filePath: string,
  schema: T
): Promise<z.infer<T>> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw withFileContext(error, filePath);
  }
  try {
    return parseYamlWithSchema(content, schema);
  } catch (error) {
    throw withFileContext(error, filePath);
  }
}

/**
 * Synchronous variant of loadYamlWithSchema.
 */
export function loadYamlWithSchemaSync<T extends z.ZodType>(
  filePath: string,
  schema: T
): z.infer<T> {
  let content: string;
  try {
    content = readFileSync(filePath);
  } catch (error) {
    throw withFileContext(error, filePath);
  }
  try {
    return parseYamlWithSchema(content, schema);
  } catch (error) {
    throw withFileContext(error, filePath);
  }
}

/**
 * Stringify an object to YAML.
 */
export function stringifyYaml(data: unknown): string {
  return stringify(data, {
    indent: 2,
    lineWidth: 100,
  });
}

/**
 * Format Zod errors into a readable string.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.map(String).join('.');
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join('; ');
}
