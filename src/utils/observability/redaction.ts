const SECRET_KEY_PATTERN = /(token|secret|password|api[_-]?key|authorization|cookie|credential|client[_-]?secret)/i;
const ADDRESS_KEY_PATTERN = /^(to|from|recipient|recipients|to_addrs|toAddrs|email|sender)$/i;
const CONTENT_KEY_PATTERN = /^(body|content|html|messages|systemPrompt|prompt|taskPrompt|plan|raw)$/i;

const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@([A-Za-z0-9.-]+\.[A-Za-z]{2,})/g;

type RedactOptions = {
  depth?: number;
};

function redactStringByKey(key: string | undefined, value: string): string {
  if (key && SECRET_KEY_PATTERN.test(key)) {
    return '[REDACTED]';
  }
  if (key && CONTENT_KEY_PATTERN.test(key)) {
    return `[REDACTED_TEXT len=${value.length}]`;
  }
  return value.replace(EMAIL_PATTERN, (_match, domain: string) => `***@${domain}`);
}

function redactUnknown(
  value: unknown,
  key?: string,
  options: RedactOptions = {},
): unknown {
  const depth = options.depth ?? 0;
  if (depth > 6) return '[TRUNCATED]';

  if (value === null || value === undefined) return value;

  if (value instanceof Error) {
    return {
      name: value.name,
      message: redactStringByKey(key, value.message),
      stack: process.env.NODE_ENV === 'development' ? value.stack : undefined,
    };
  }

  if (typeof value === 'string') {
    return redactStringByKey(key, value);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Array.isArray(value)) {
    if (key && CONTENT_KEY_PATTERN.test(key)) {
      return `[REDACTED_ARRAY len=${value.length}]`;
    }
    if (key && ADDRESS_KEY_PATTERN.test(key)) {
      return value.map((item) => (typeof item === 'string' ? redactEmail(item) : '[REDACTED]'));
    }
    return value.map((item) => redactUnknown(item, key, { depth: depth + 1 }));
  }

  if (typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [childKey, childValue] of Object.entries(value)) {
      if (SECRET_KEY_PATTERN.test(childKey)) {
        result[childKey] = '[REDACTED]';
        continue;
      }
      result[childKey] = redactUnknown(childValue, childKey, { depth: depth + 1 });
    }
    return result;
  }

  return String(value);
}

/** Keep only the domain of an address: `jane@example.com` → `***@example.com`. */
export function redactEmail(address: string): string {
  const at = address.lastIndexOf('@');
  if (at < 0) return '***';
  return `***${address.slice(at)}`;
}

export function redactSecrets<T extends string | Record<string, unknown>>(value: T): T;
export function redactSecrets(value: unknown): unknown {
  return redactUnknown(value);
}

export function safeSnippet(value: string, maxLength = 140): string {
  if (value.length <= maxLength) return value;
  return `${value.slice(0, maxLength)}...(truncated)`;
}
