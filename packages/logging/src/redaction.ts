// Key fragments that mark a value as secret once the key is lower-cased and
// stripped of everything but letters, digits and underscores.
const SECRET_KEY_FRAGMENTS = [
  'ssh_priv_key',
  'priv_key',
  'private_key',
  'privatekey',
  'password',
  'passwd',
  'secret',
  'token',
  'authorization',
  'cookie',
  'api_key',
  'apikey'
] as const;

const REDACTED = '[REDACTED]';
const MAX_DEPTH = 12;

const normalizeKey = (key: string) => key.trim().toLowerCase().replace(/[^a-z0-9_]/gu, '');

type RedactionState = {
  extraKeys: ReadonlySet<string>;
  visited: WeakSet<object>;
};

const isSecretKey = (key: string, state: RedactionState) => {
  const normalized = normalizeKey(key);
  return state.extraKeys.has(normalized) || SECRET_KEY_FRAGMENTS.some(fragment => normalized.includes(fragment));
};

const redactValue = (value: unknown, depth: number, state: RedactionState): unknown => {
  if (depth > MAX_DEPTH) {
    return '[TRUNCATED]';
  }

  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
    case 'undefined':
      return value;
    case 'bigint':
    case 'symbol':
      return value.toString();
    case 'function':
      return '[FUNCTION]';
    case 'object':
      break;
  }

  if (value === null || typeof value !== 'object') {
    return null;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '[INVALID_DATE]' : value.toISOString();
  }
  if (state.visited.has(value)) {
    return '[CIRCULAR]';
  }
  state.visited.add(value);

  if (value instanceof Error) {
    // RemoteCallError and friends carry reason, method and code as own fields.
    const fields = redactValue({...value}, depth + 1, state);
    return {
      name: value.name,
      message: value.message,
      ...(typeof fields === 'object' && fields !== null ? fields : {}),
      ...(value.stack ? {stack: value.stack} : {})
    };
  }

  if (Array.isArray(value)) {
    return value.map(item => redactValue(item, depth + 1, state));
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    redacted[key] = isSecretKey(key, state) ? REDACTED : redactValue(entry, depth + 1, state);
  }
  return redacted;
};

/**
 * Copies `value` for logging with secret-looking keys masked, errors flattened to
 * plain objects and cycles cut. `extraSensitiveKeys` match whole keys.
 */
export const sanitizeForLog = ({
  value,
  extraSensitiveKeys = []
}: {
  value: unknown;
  extraSensitiveKeys?: readonly string[];
}): unknown =>
  redactValue(value, 0, {
    extraKeys: new Set(extraSensitiveKeys.map(normalizeKey).filter(key => key.length > 0)),
    visited: new WeakSet<object>()
  });
