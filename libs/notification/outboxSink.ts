/**
 * Outbox Notification Sink
 *
 * Transactional Outbox pattern: the message is written to
 * notification_outbox and a separate relayer delivers it.
 */

import { z } from 'zod';
import { Queryable } from '../db/index.js';
import { logger } from '../logging/logger.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { NotificationSink, RecoveryMessage } from './types.js';

export const RECOVERY_EVENT_TYPE = 'PASSWORD_RECOVERY';

const OutboxRowSchema = z.object({ id: z.coerce.string() });

export class OutboxNotificationSink implements NotificationSink {
    constructor(private readonly db: Queryable) { }

    public async publish(message: RecoveryMessage): Promise<void> {
        try {
            const result = await this.db.query(`
                INSERT INTO notification_outbox (
                    hub_id,
                    event_type,
                    recipient_address,
                    recipient_name,
                    subject,
                    body,
                    fields,
                    status,
                    created_at
                ) VALUES ($1, $2, $3, $4, $5, $6, $7, 'PENDING', NOW())
                RETURNING id;
            `, [
                message.hubId,
                RECOVERY_EVENT_TYPE,
                message.recipient.address,
                message.recipient.name,
                message.subject,
                message.body,
                JSON.stringify(message.fields)
            ]);

            const row = OutboxRowSchema.parse(result.rows[0]);

            logger.info({
                event: 'NOTIFICATION_QUEUED',
                outboxId: row.id,
                hubId: message.hubId,
                eventType: RECOVERY_EVENT_TYPE
            });
        } catch (error: unknown) {
            throw ErrorSanitizer.sanitize(error, 'NotificationOutbox:PublishFailed');
        }
    }
}
