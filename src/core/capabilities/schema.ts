import { z } from 'zod/v4';

/** Environments in matrix order. */
export const ENVIRONMENTS = ['ON_PREM', 'AZURE_IAAS', 'MANAGED_INSTANCE'] as const;

export const AVAILABILITIES = ['FULL', 'PARTIAL', 'NOT_AVAILABLE', 'MANAGED_EXTERNALLY'] as const;

export const CAPABILITY_CATEGORIES = ['INDEXING', 'BACKUP', 'HIGH_AVAILABILITY', 'SECURITY', 'PLATFORM'] as const;

/**
 * Zod schema for one capability row: a feature in one environment.
 */
const capabilityRowSchema = z.strictObject({
  name: z.string().trim().min(1),
  category: z.enum(CAPABILITY_CATEGORIES),
  environment: z.enum(ENVIRONMENTS),
  status: z.enum(AVAILABILITIES),
  note: z.string().min(1).optional(),
});

/** Zod schema for the full capability source file. */
export const capabilitySourceSchema = z.strictObject({
  capabilities: z.array(capabilityRowSchema),
});

/** Parsed type for a capability row. */
export type CapabilityRow = z.infer<typeof capabilityRowSchema>;
