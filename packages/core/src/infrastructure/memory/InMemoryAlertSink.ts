import type { AlertSink } from '../../domain/ports/AlertSink.js';
import type { Alert, AlertKind } from '../../domain/model/Alert.js';

/** Collects alerts in memory. */
export class InMemoryAlertSink implements AlertSink {
  readonly alerts: Alert[] = [];

  send(alert: Alert): Promise<void> {
    this.alerts.push(alert);
    return Promise.resolve();
  }

  ofKind(kind: AlertKind): readonly Alert[] {
    return this.alerts.filter((a) => a.kind === kind);
  }
}
