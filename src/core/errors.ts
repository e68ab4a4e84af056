/** Error codes raised by the advisor. */
export type AdvisorErrorCode =
  | 'UNKNOWN_RULE_SET'
  | 'NO_RULE_MATCHED'
  | 'INVALID_FACT'
  | 'UNKNOWN_CAPABILITY'
  | 'UNKNOWN_ENVIRONMENT'
  | 'DUPLICATE_CAPABILITY_ENTRY'
  | 'DUPLICATE_RULE_ORDER'
  | 'MALFORMED_SOURCE';

/** Codes raised while loading rule or capability data. */
const LOAD_ERROR_CODES: ReadonlySet<AdvisorErrorCode> = new Set<AdvisorErrorCode>([
  'DUPLICATE_CAPABILITY_ENTRY',
  'DUPLICATE_RULE_ORDER',
  'MALFORMED_SOURCE',
]);

/**
 * Error raised by the rule engine, the capability resolver and their loaders.
 *
 * `context` holds whatever triggered the failure (the fact, the rule set id,
 * the capability name, validation issues) so callers can report it.
 */
export class AdvisorError extends Error {
  readonly code: AdvisorErrorCode;
  readonly context: Readonly<Record<string, unknown>>;

  constructor(code: AdvisorErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'AdvisorError';
    this.code = code;
    this.context = Object.freeze({ ...context });
  }
}

export function isAdvisorError(error: unknown, code?: AdvisorErrorCode): error is AdvisorError {
  if (!(error instanceof AdvisorError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

/** True for errors raised while loading sources rather than while evaluating. */
export function isLoadError(error: unknown): error is AdvisorError {
  return error instanceof AdvisorError && LOAD_ERROR_CODES.has(error.code);
}

/** Flatten zod-style issues into `path: message` lines. */
export function formatIssues(
  issues: readonly { readonly path: readonly PropertyKey[]; readonly message: string }[],
): string[] {
  return issues.map((issue) => {
    const path = issue.path.map(String).join('.');
    return path !== '' ? `${path}: ${issue.message}` : issue.message;
  });
}
