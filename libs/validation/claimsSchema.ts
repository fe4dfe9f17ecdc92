import { z } from 'zod';

/**
 * Token payload wire format.
 * Field order here is the order the payload is signed in.
 */
export const TokenPayloadSchema = z.object({
    sub: z.string().min(1),
    email: z.string().min(1),
    hub_id: z.number().int().positive(),
    name: z.string(),
    roles: z.array(z.string()),
    exp: z.number().int().nonnegative(),
});

export type TokenPayload = z.infer<typeof TokenPayloadSchema>;
