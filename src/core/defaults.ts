import { fileURLToPath } from 'node:url';

/** Rule source shipped with the package. */
export const DEFAULT_RULES_PATH = fileURLToPath(new URL('../../data/rules.json', import.meta.url));

/** Capability matrix shipped with the package. */
export const DEFAULT_CAPABILITIES_PATH = fileURLToPath(new URL('../../data/capabilities.json', import.meta.url));
