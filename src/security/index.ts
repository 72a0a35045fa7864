/**
 * Security utilities for input validation and safe data handling
 *
 * Non-negotiables:
 * - Never open paths containing traversal sequences
 * - Always bound input size before parsing JSON
 */

/**
 * Validates a file path to prevent directory traversal attacks
 * Only allows relative paths within the config directory
 */
export function validateSafePath(inputPath: string): { valid: boolean; sanitized?: string; error?: string } {
  // Check for null bytes
  if (inputPath.includes('\0')) {
    return { valid: false, error: 'Path contains null bytes' };
  }

  // Check for traversal sequences
  const normalized = inputPath.replace(/\\/g, '/');
  if (normalized === '..' || normalized.startsWith('../') || normalized.includes('/../') || normalized.endsWith('/..')) {
    return { valid: false, error: 'Path traversal detected' };
  }

  // Check for absolute paths that might escape the config directory
  if (normalized.startsWith('/') || /^[a-zA-Z]:/.test(normalized)) {
    return { valid: false, error: 'Absolute paths not allowed' };
  }

  return { valid: true, sanitized: normalized };
}

/** Default upper bound on a JSON document handed to `safeJsonParse`. */
export const MAX_JSON_BYTES = 50 * 1024 * 1024;

/**
 * Safely parses JSON with a size limit
 */
export function safeJsonParse(
  input: string,
  options: { maxSize?: number } = {},
): { success: boolean; data?: unknown; error?: string } {
  const { maxSize = MAX_JSON_BYTES } = options;

  if (input.length > maxSize) {
    return { success: false, error: `Input exceeds maximum size of ${maxSize} bytes` };
  }

  try {
    const parsed: unknown = JSON.parse(input);
    return { success: true, data: parsed };
  } catch (err) {
    const message = err instanceof Error ? err.message : 'Invalid JSON';
    return { success: false, error: `JSON parse error: ${message}` };
  }
}
