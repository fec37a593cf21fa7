/**
 * Notification sink that writes every event to the structured log
 */
import type pino from 'pino';
import { getLogger } from '../../config/logger.js';
import type { AmmEvent, INotificationSink } from '../../domain/ports/INotificationSink.js';
import { serializeEvent } from './serialize.js';

export class LoggingNotificationSink implements INotificationSink {
  private readonly logger: pino.Logger;

  constructor(logger: pino.Logger = getLogger().child({ service: 'events' })) {
    this.logger = logger;
  }

  publish(event: AmmEvent): void {
    this.logger.info({ event: serializeEvent(event) }, event.type);
  }
}
