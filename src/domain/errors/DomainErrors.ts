export type ErrorClassification = 'lookup' | 'template' | 'invocation';

/** 所有 pathbook domain 錯誤的基底類別 */
export abstract class PathbookError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Lookup ---

export class UnknownAliasError extends PathbookError {
  readonly classification = 'lookup' as const;
  readonly code = 'UNKNOWN_ALIAS';

  constructor(
    public readonly alias: string,
    public readonly knownAliases: readonly string[],
    options?: ErrorOptions,
  ) {
    const known = knownAliases.length > 0 ? knownAliases.join(', ') : '(none)';
    super(`Unknown alias "${alias}". Registered aliases: ${known}`, options);
  }
}

export class InvalidAliasError extends PathbookError {
  readonly classification = 'lookup' as const;
  readonly code = 'INVALID_ALIAS';

  constructor(
    public readonly alias: string,
    options?: ErrorOptions,
  ) {
    super(
      `Invalid alias "${alias}": aliases must start with a letter and contain only letters, digits and underscores`,
      options,
    );
  }
}

// --- Template ---

export class UndefinedPlaceholderError extends PathbookError {
  readonly classification = 'template' as const;
  readonly code = 'UNDEFINED_PLACEHOLDER';

  constructor(
    public readonly alias: string,
    public readonly placeholders: readonly string[],
    options?: ErrorOptions,
  ) {
    super(
      `Cannot construct path for "${alias}", because the following placeholders are missing: ${placeholders.join(', ')}`,
      options,
    );
  }
}

export class MissingArgumentsError extends PathbookError {
  readonly classification = 'template' as const;
  readonly code = 'MISSING_ARGUMENTS';

  constructor(
    public readonly alias: string,
    public readonly placeholders: readonly string[],
    options?: ErrorOptions,
  ) {
    const example = placeholders.map((p) => `${p}: ...`).join(', ');
    super(
      `Alias "${alias}" needs values for ${placeholders.join(', ')}. Use resolve('${alias}', { ${example} }) instead of get().`,
      options,
    );
  }
}

export class CyclicReferenceError extends PathbookError {
  readonly classification = 'template' as const;
  readonly code = 'CYCLIC_REFERENCE';

  constructor(
    public readonly chain: readonly string[],
    options?: ErrorOptions,
  ) {
    super(`Cyclic alias reference: ${chain.join(' -> ')}`, options);
  }
}

export class TemplateFormatError extends PathbookError {
  readonly classification = 'template' as const;
  readonly code = 'FORMAT_ERROR';

  constructor(
    message: string,
    public readonly template: string,
    options?: ErrorOptions,
  ) {
    super(`${message} (in template "${template}")`, options);
  }
}

// --- Invocation ---

export class CallableInvocationError extends PathbookError {
  readonly classification = 'invocation' as const;
  readonly code = 'CALLABLE_INVOCATION';

  constructor(
    public readonly alias: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Path function for "${alias}" failed: ${reason}`, { cause });
  }
}
