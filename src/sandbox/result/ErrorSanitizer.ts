export const MAX_ERROR_LENGTH = 2000;
export const PATH_PLACEHOLDER = '<path>';

// Absolute POSIX, Windows and file:// paths with at least one directory segment.
const HOST_PATH_PATTERN =
  /(?<![\w:/.\\])(?:file:\/\/)?(?:[A-Za-z]:\\|\/)(?:[^\s'"`:()<>\\/]+[\\/])+[^\s'"`:()<>\\/]*/g;

const MAX_PROTOTYPE_DEPTH = 32;

export function sanitizeHostPaths(text: string): string {
  return text.replace(HOST_PATH_PATTERN, PATH_PLACEHOLDER);
}

export function sanitizeErrorText(text: string): string {
  const sanitized = sanitizeHostPaths(text);
  return sanitized.length > MAX_ERROR_LENGTH ? sanitized.slice(0, MAX_ERROR_LENGTH) : sanitized;
}

/**
 * Read a property through data descriptors only, walking the prototype chain.
 * Accessors are ignored so nothing defined by guest code runs here.
 */
export function readDataProperty(target: object, key: string): unknown {
  let current: object | null = target;
  for (let depth = 0; current !== null && depth < MAX_PROTOTYPE_DEPTH; depth++) {
    const descriptor = Object.getOwnPropertyDescriptor(current, key);
    if (descriptor) {
      return 'value' in descriptor ? descriptor.value : undefined;
    }
    current = Object.getPrototypeOf(current);
  }
  return undefined;
}

export interface ThrownValueDescription {
  name: string;
  message: string;
}

/**
 * Name and message of anything a snippet can throw, sanitized.
 */
export function describeThrownValue(value: unknown): ThrownValueDescription {
  if (typeof value === 'object' && value !== null) {
    const name = readDataProperty(value, 'name');
    const message = readDataProperty(value, 'message');
    return {
      name: typeof name === 'string' && name.length > 0 ? sanitizeErrorText(name) : 'Error',
      message:
        typeof message === 'string' ? sanitizeErrorText(message) : 'A non-error object was thrown',
    };
  }

  if (typeof value === 'function') {
    return { name: 'Error', message: 'A function was thrown' };
  }

  return { name: 'Error', message: sanitizeErrorText(String(value)) };
}
