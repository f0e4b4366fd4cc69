/**
 * Zod schemas for session configuration validation
 */

import { z } from "zod";
import type { SessionConfig } from "../../types/config.js";

/**
 * IAM role ARN schema
 */
const roleArnSchema = z
  .string()
  .regex(
    /^arn:aws[a-z-]*:iam::\d{12}:role\/.+$/,
    "Must be a valid IAM role ARN (e.g., arn:aws:iam::123456789012:role/dns)"
  );

/**
 * Main session configuration schema
 */
export const sessionConfigSchema: z.ZodType<SessionConfig> = z.object({
  profile: z.string().min(1, "Profile name cannot be empty").optional(),
  region: z
    .string()
    .regex(
      /^[a-z]{2}(-[a-z]+)+-\d+$/,
      "Must be a valid AWS region (e.g., us-east-1)"
    )
    .optional(),
  assumeRole: roleArnSchema.optional(),
  assumeRoleExternalId: z
    .string()
    .min(2, "External ID must be at least 2 characters")
    .max(1224, "External ID must be at most 1224 characters")
    .optional(),
  apiRetries: z.number().int().min(0).max(20).optional(),
  domainRolesMap: z
    .record(z.string().min(1, "Domain name cannot be empty"), roleArnSchema)
    .optional(),
});

/**
 * Validate session config and return typed result
 */
export function validateSessionConfig(config: unknown): SessionConfig {
  return sessionConfigSchema.parse(config);
}

/**
 * Validate session config with safe parsing (returns result object)
 */
export function validateSessionConfigSafe(config: unknown) {
  return sessionConfigSchema.safeParse(config);
}
