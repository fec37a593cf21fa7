/**
 * Hands events to the notification sink. Delivery is fire-and-forget:
 * a sink failure is logged and never reaches the operation that emitted it.
 */
import type pino from 'pino';
import type { AmmEvent, INotificationSink } from '../../domain/ports/INotificationSink.js';

export class EventPublisher {
  constructor(
    private readonly sink: INotificationSink | undefined,
    private readonly logger: pino.Logger,
  ) {}

  publish(event: AmmEvent): void {
    if (!this.sink) return;
    try {
      this.sink.publish(event);
    } catch (err) {
      this.logger.error({ err, eventType: event.type, poolId: event.poolId }, 'Notification sink failed');
    }
  }
}
