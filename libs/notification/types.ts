/**
 * Outbound notification contract.
 * Sinks are fire-and-forget: the caller never waits on delivery.
 */

export interface RecoveryRecipient {
    readonly address: string;
    readonly name: string;
}

export interface RecoveryMessage {
    readonly hubId: number;
    readonly recipient: RecoveryRecipient;
    readonly subject: string;
    readonly body: string;
    readonly fields: Readonly<Record<string, string>>;
}

export interface NotificationSink {
    /** Resolves once the message is accepted for delivery; rejects if it was not. */
    publish(message: RecoveryMessage): Promise<void>;
}
