import { REPORT_SCHEMA_VERSION } from './reportSchema.js';

const BASE_CONTEXT_SHADOW_KEYS = new Set<string>([
  'schemaVersion',
  'name',
  'code',
  'message',
  'hint',
  'context'
]);

/** JSON-safe error report shared by every coffer error class. */
export type ErrorReport<Code extends string> = {
  schemaVersion: string;
  name: string;
  code: Code;
  message: string;
  hint: string;
  context: Record<string, string>;
};

export function sanitizeErrorContext(
  context: Record<string, string> | undefined,
  topLevelShadowKeys: readonly string[] = []
): Record<string, string> {
  if (!context) return {};
  const disallowedKeys = new Set<string>(BASE_CONTEXT_SHADOW_KEYS);
  for (const key of topLevelShadowKeys) {
    disallowedKeys.add(key);
  }
  const sanitized: Record<string, string> = {};
  for (const [key, value] of Object.entries(context)) {
    if (disallowedKeys.has(key)) continue;
    sanitized[key] = value;
  }
  return sanitized;
}

export function buildErrorReport<Code extends string, Extra extends Record<string, unknown>>(
  error: { name: string; code: Code; message: string; context?: Record<string, string> | undefined },
  extra: Extra
): ErrorReport<Code> & Extra {
  const context = sanitizeErrorContext(error.context, Object.keys(extra));
  return {
    schemaVersion: REPORT_SCHEMA_VERSION,
    name: error.name,
    code: error.code,
    message: error.message,
    hint: error.message,
    context,
    ...extra
  };
}
