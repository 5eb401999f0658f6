export class InvalidDnError extends Error {
  override readonly name = 'InvalidDnError';

  constructor(
    readonly dn: string,
    message?: string,
  ) {
    super(message ?? `Invalid distinguished name: ${JSON.stringify(dn)}`);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends Error {
  override readonly name = 'NotFoundError';

  constructor(
    readonly dn: string,
    message?: string,
  ) {
    super(message ?? `No entry found for ${dn}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnknownAttributeError extends Error {
  override readonly name = 'UnknownAttributeError';

  constructor(
    readonly attribute: string,
    message?: string,
  ) {
    super(message ?? `No attributeType named ${JSON.stringify(attribute)} in the directory schema`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SchemaCycleError extends Error {
  override readonly name = 'SchemaCycleError';

  constructor(readonly path: readonly string[]) {
    super(`Schema inheritance cycle: ${path.join(' -> ')}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SchemaParseError extends Error {
  override readonly name = 'SchemaParseError';

  constructor(
    readonly definition: string,
    message: string,
  ) {
    super(`${message} in schema definition ${JSON.stringify(definition)}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidScopeError extends Error {
  override readonly name = 'InvalidScopeError';

  constructor(readonly scope: string) {
    super(`Unrecognized search scope ${JSON.stringify(scope)} (expected base, one, onelevel, sub or subtree)`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidFilterError extends Error {
  override readonly name = 'InvalidFilterError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
