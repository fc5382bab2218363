/**
 * JSON Pointer (RFC 6901) lookup into decoded JSON/YAML values
 */

export class JsonPointerError extends Error {
  public readonly pointer: string;

  constructor(pointer: string, message: string) {
    super(`invalid JSON pointer '${pointer}': ${message}`);
    this.name = 'JsonPointerError';
    this.pointer = pointer;
  }
}

function unescapeToken(token: string): string {
  return token.replaceAll('~1', '/').replaceAll('~0', '~');
}

/**
 * Split a pointer into unescaped reference tokens
 *
 * @example
 * ```typescript
 * parsePointer('/definitions/a~1b'); // ['definitions', 'a/b']
 * parsePointer('');                  // []
 * ```
 */
export function parsePointer(pointer: string): string[] {
  if (pointer === '') {
    return [];
  }
  if (!pointer.startsWith('/')) {
    throw new JsonPointerError(pointer, "pointer must be empty or start with '/'");
  }
  return pointer.slice(1).split('/').map(unescapeToken);
}

/**
 * Return the value addressed by `pointer` inside `document`
 *
 * @throws JsonPointerError when a token does not exist
 */
export function getByPointer(document: unknown, pointer: string): unknown {
  let current = document;

  for (const token of parsePointer(pointer)) {
    if (Array.isArray(current)) {
      if (!/^(0|[1-9][0-9]*)$/.test(token) || Number(token) >= current.length) {
        throw new JsonPointerError(pointer, `no array element '${token}'`);
      }
      current = current[Number(token)];
    } else if (typeof current === 'object' && current !== null && Object.hasOwn(current, token)) {
      current = Object.getOwnPropertyDescriptor(current, token)?.value;
    } else {
      throw new JsonPointerError(pointer, `no value at '${token}'`);
    }
  }

  return current;
}

/**
 * Decode the URI-fragment form of a pointer (`#/definitions/a%20b`)
 */
export function decodePointerFragment(fragment: string): string {
  try {
    return decodeURIComponent(fragment);
  } catch {
    return fragment;
  }
}
