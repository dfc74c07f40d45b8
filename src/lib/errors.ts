export class InvalidSlugError extends Error {
  readonly slug: string;

  constructor(slug: string) {
    super(`Invalid post slug: ${JSON.stringify(slug)}`);
    this.name = 'InvalidSlugError';
    this.slug = slug;
  }
}

export class PostNotFoundError extends Error {
  readonly slug: string;

  constructor(slug: string) {
    super(`No post named "${slug}"`);
    this.name = 'PostNotFoundError';
    this.slug = slug;
  }
}

/** Raised by a reading source whose backend is missing or corrupt. Only ever seen at load time. */
export class SourceUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SourceUnavailableError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
