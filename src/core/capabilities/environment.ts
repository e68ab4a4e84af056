import { AdvisorError } from '../errors.js';
import type { Environment } from '../report/reportTypes.js';
import { ENVIRONMENTS } from './schema.js';

const ALIASES: Readonly<Record<string, Environment>> = {
  ONPREM: 'ON_PREM',
  ON_PREMISES: 'ON_PREM',
  IAAS: 'AZURE_IAAS',
  VM: 'AZURE_IAAS',
  AZURE_VM: 'AZURE_IAAS',
  MI: 'MANAGED_INSTANCE',
  SQLMI: 'MANAGED_INSTANCE',
};

/**
 * Match an environment name as typed by a user.
 * Case-insensitive; `-`, `_` and spaces are interchangeable.
 */
export function matchEnvironment(input: string): Environment | undefined {
  const key = input.trim().toUpperCase().replace(/[\s-]+/g, '_');
  return ENVIRONMENTS.find((env) => env === key) ?? ALIASES[key];
}

/** Like `matchEnvironment`, failing with INVALID_FACT on unrecognized input. */
export function parseEnvironment(input: string): Environment {
  const environment = matchEnvironment(input);
  if (environment !== undefined) {
    return environment;
  }
  throw new AdvisorError(
    'INVALID_FACT',
    `Unrecognized environment "${input}". Expected one of ${ENVIRONMENTS.join(', ')}.`,
    { environment: input },
  );
}

/** Position of an environment in matrix order. */
export function environmentRank(environment: Environment): number {
  return ENVIRONMENTS.indexOf(environment);
}
