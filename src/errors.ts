export class FormsError extends Error {
  override readonly name: string = 'FormsError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Renders this error and every error in its `cause` chain, each followed by
   * its stack frames.
   */
  fullTrace(): string {
    const sections: string[] = [];
    const seen = new Set<unknown>();
    let current: unknown = this;
    let depth = 0;
    while (current !== undefined && current !== null && !seen.has(current)) {
      seen.add(current);
      const prefix = depth === 0 ? '' : 'Caused by ';
      if (current instanceof Error) {
        const frames = (current.stack ?? '')
          .split('\n')
          .slice(1)
          .map((line) => `\t${line.trim()}`);
        sections.push([`${prefix}${current.name}: ${current.message}`, ...frames].join('\n'));
        current = current.cause;
      } else {
        sections.push(`${prefix}${String(current)}`);
        current = undefined;
      }
      depth++;
    }
    return sections.join('\n');
  }
}

export class NoRefSetError extends FormsError {
  override readonly name = 'NoRefSetError';

  constructor(message?: string) {
    super(message ?? 'No ref set: pass one to submit(), call ref(), or bind one when creating the form');
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedFormKindError extends FormsError {
  override readonly name = 'UnsupportedFormKindError';

  constructor(
    readonly method: string,
    readonly enctype: string,
  ) {
    super(`Unsupported kind of form: ${method} / ${enctype}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Non-200 answer from a form endpoint. `body` is the parsed JSON error
 * document, or the raw text when the body is not JSON.
 */
export class FormSearchError extends FormsError {
  override readonly name: string = 'FormSearchError';

  constructor(
    readonly status: number,
    readonly body: unknown,
    message?: string,
  ) {
    super(message ?? `Form search failed with HTTP ${status}${describeBody(body)}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AuthenticationError extends FormSearchError {
  override readonly name = 'AuthenticationError';

  constructor(body: unknown) {
    super(401, body, `Authentication required${describeBody(body)}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AuthorizationError extends FormSearchError {
  override readonly name = 'AuthorizationError';

  constructor(body: unknown) {
    super(403, body, `Access denied${describeBody(body)}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RefNotFoundError extends FormSearchError {
  override readonly name = 'RefNotFoundError';

  constructor(body: unknown) {
    super(404, body, `Ref not found${describeBody(body)}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DecodingError extends FormsError {
  override readonly name = 'DecodingError';

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnknownFieldError extends FormsError {
  override readonly name = 'UnknownFieldError';

  constructor(
    readonly accessor: string,
    readonly formName: string,
  ) {
    super(`Form "${formName}" has no field accessor "${accessor}"`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class CacheError extends FormsError {
  override readonly name = 'CacheError';

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function describeBody(body: unknown): string {
  if (typeof body === 'string') {
    return body.length > 0 ? `: ${body}` : '';
  }
  if (typeof body === 'object' && body !== null) {
    if ('message' in body && typeof body.message === 'string') return `: ${body.message}`;
    if ('error' in body && typeof body.error === 'string') return `: ${body.error}`;
  }
  return '';
}
