/**
 * Session Token Configuration Schema
 *
 * Validates the JSON config file; environment overrides are applied to
 * the parsed result.
 */

import { z } from 'zod';

/** Keys shorter than this are accepted with a warning */
export const RECOMMENDED_SECRET_KEY_LENGTH = 32;

export const AuditConfigSchema = z.object({
  enabled: z.boolean().default(false),
  logAllAttempts: z
    .boolean()
    .default(true)
    .describe('Record successful generations as well as failed verifications'),
});

export const SessionConfigSchema = z.object({
  secretKey: z
    .string()
    .trim()
    .min(1, 'secretKey must not be empty')
    .optional()
    .describe('HMAC key used to sign and verify session ids'),
  signSessions: z.boolean().default(false).describe('Sign generated session ids and require signatures'),
  audit: AuditConfigSchema.default({}),
});

export type SessionConfig = z.infer<typeof SessionConfigSchema>;
export type AuditConfig = z.infer<typeof AuditConfigSchema>;

export const DEFAULT_SESSION_CONFIG: SessionConfig = SessionConfigSchema.parse({});
