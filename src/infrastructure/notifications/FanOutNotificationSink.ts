/**
 * Delivers each event to several sinks. A failing sink does not stop the
 * others; failures are rethrown once every sink has been tried.
 */
import type { AmmEvent, INotificationSink } from '../../domain/ports/INotificationSink.js';

export class FanOutNotificationSink implements INotificationSink {
  private readonly sinks: INotificationSink[];

  constructor(...sinks: INotificationSink[]) {
    this.sinks = sinks;
  }

  publish(event: AmmEvent): void {
    const failures: unknown[] = [];
    for (const sink of this.sinks) {
      try {
        sink.publish(event);
      } catch (err) {
        failures.push(err);
      }
    }
    if (failures.length === 1) throw failures[0];
    if (failures.length > 1) throw new AggregateError(failures, `${failures.length} notification sinks failed`);
  }
}
