import { z } from 'zod';

/**
 * Input schemas for the authority's entry points.
 * Emails are trimmed and lower-cased before lookup.
 */

const EmailSchema = z.string().trim().toLowerCase().email();

const HubIdSchema = z.coerce.number().int().positive();

export const LoginInputSchema = z.object({
    email: EmailSchema,
    password: z.string().min(1),
    hubId: HubIdSchema,
});

export const RecoveryInputSchema = z.object({
    email: EmailSchema,
    hubId: HubIdSchema,
});

export const TokenInputSchema = z.object({
    token: z.string().min(1),
});
