/**
 * Session Errors
 *
 * Failures that abort the whole run. Everything else (odd diagnostic lines,
 * a debugger that goes quiet mid-walk) is handled where it happens.
 */

export type AutopsyErrorKind = 'launch' | 'attach' | 'config';

export class AutopsyError extends Error {
  readonly kind: AutopsyErrorKind;

  constructor(kind: AutopsyErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** The analyzer or debugger process could not be started */
export class LaunchError extends AutopsyError {
  constructor(message: string) {
    super('launch', message);
  }
}

/** The debugger gave no answer to the remote attach command */
export class AttachError extends AutopsyError {
  constructor(message: string) {
    super('attach', message);
  }
}

export class ConfigError extends AutopsyError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('config', `Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.issues = issues;
  }
}
