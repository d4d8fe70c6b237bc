export class SiteAliasError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SiteAliasError";
  }
}

export class AliasNotFoundError extends SiteAliasError {
  constructor(public reference: string) {
    super(`Alias not found: ${reference}`);
    this.name = "AliasNotFoundError";
  }
}

export class NoBootstrappedSiteError extends SiteAliasError {
  constructor() {
    super("@self was requested but no site root was given or found from the current directory");
    this.name = "NoBootstrappedSiteError";
  }
}

export class InvalidAliasReferenceError extends SiteAliasError {
  constructor(
    public reference: string,
    reason: string,
  ) {
    super(`Invalid alias reference "${reference}": ${reason}`);
    this.name = "InvalidAliasReferenceError";
  }
}

export class MalformedAliasFileError extends SiteAliasError {
  constructor(
    public path: string,
    reason: string,
  ) {
    super(`Malformed alias file ${path}: ${reason}`);
    this.name = "MalformedAliasFileError";
  }
}

export class PathAliasNotFoundError extends SiteAliasError {
  constructor(
    public reference: string,
    reason: string,
  ) {
    super(`Cannot evaluate path "${reference}": ${reason}`);
    this.name = "PathAliasNotFoundError";
  }
}
