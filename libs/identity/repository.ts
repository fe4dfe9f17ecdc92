/**
 * Hubgate Identity Repository
 *
 * Read-only access to identities and their role assignments.
 * All queries use parameterized statements and explicit column lists.
 */

import { z } from 'zod';
import { Queryable } from '../db/index.js';
import { Identity } from '../context/identity.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';

export interface IdentityRepository {
    /** Email is compared case-insensitively. */
    findIdentityByEmailAndHub(email: string, hubId: number): Promise<Identity | null>;
    findIdentityById(id: number): Promise<Identity | null>;
}

const IdentityRowSchema = z.object({
    id: z.coerce.number().int().positive(),
    email: z.string(),
    hub_id: z.coerce.number().int().positive(),
    name: z.string().nullable(),
    password_hash: z.string(),
    roles: z.array(z.string())
});

type IdentityRow = z.infer<typeof IdentityRowSchema>;

const IDENTITY_SELECT = `
    SELECT
        u.id,
        u.email,
        u.hub_id,
        u.name,
        u.password_hash,
        COALESCE(
            array_agg(r.name ORDER BY r.id) FILTER (WHERE r.id IS NOT NULL),
            '{}'
        ) AS roles
    FROM users u
    LEFT JOIN user_roles ur ON ur.user_id = u.id
    LEFT JOIN roles r ON r.id = ur.role_id`;

export class PgIdentityRepository implements IdentityRepository {
    constructor(private readonly db: Queryable) { }

    /**
     * Returns null if not found. Does NOT throw on a miss.
     */
    async findIdentityByEmailAndHub(email: string, hubId: number): Promise<Identity | null> {
        return this.findOne(
            `${IDENTITY_SELECT}
            WHERE lower(u.email) = $1 AND u.hub_id = $2
            GROUP BY u.id
            LIMIT 1`,
            [email.trim().toLowerCase(), hubId],
            'IdentityRepository:FindByEmailAndHub'
        );
    }

    async findIdentityById(id: number): Promise<Identity | null> {
        if (!Number.isSafeInteger(id) || id <= 0) {
            return null;
        }
        return this.findOne(
            `${IDENTITY_SELECT}
            WHERE u.id = $1
            GROUP BY u.id
            LIMIT 1`,
            [id],
            'IdentityRepository:FindById'
        );
    }

    private async findOne(text: string, params: unknown[], contextLabel: string): Promise<Identity | null> {
        try {
            const result = await this.db.query(text, params);
            const row = result.rows[0];
            if (row === undefined) {
                return null;
            }
            return mapRowToIdentity(IdentityRowSchema.parse(row));
        } catch (error: unknown) {
            throw ErrorSanitizer.sanitize(error, contextLabel);
        }
    }
}

function mapRowToIdentity(row: IdentityRow): Identity {
    return Object.freeze({
        id: row.id,
        email: row.email,
        hubId: row.hub_id,
        name: row.name,
        passwordHash: row.password_hash,
        roles: Object.freeze([...row.roles])
    });
}
