/**
 * Credential Verifier
 * bcrypt comparison of a submitted secret against a stored hash.
 *
 * The plaintext is never logged or persisted. A malformed stored hash is a
 * verification failure, not an error that aborts the request.
 */

import bcrypt from 'bcryptjs';
import { logger } from '../logging/logger.js';

/** Fixed cost factor for newly produced hashes. */
export const BCRYPT_ROUNDS = 12;

export class CredentialVerifier {
    constructor(private readonly rounds: number = BCRYPT_ROUNDS) {}

    async verify(plaintext: string, storedHash: string): Promise<boolean> {
        try {
            return await bcrypt.compare(plaintext, storedHash);
        } catch (error: unknown) {
            logger.warn({
                error: error instanceof Error ? error.message : String(error),
                hashLength: storedHash.length
            }, 'Stored password hash could not be compared');
            return false;
        }
    }

    async hash(plaintext: string): Promise<string> {
        const salt = await bcrypt.genSalt(this.rounds);
        return bcrypt.hash(plaintext, salt);
    }
}
