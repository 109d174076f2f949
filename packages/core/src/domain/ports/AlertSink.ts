import type { Alert } from '../model/Alert.js';

/** Operational alerting collaborator. The core only emits; delivery is not its concern. */
export interface AlertSink {
  send(alert: Alert): Promise<void>;
}
