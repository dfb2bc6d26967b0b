import type { NotificationSink } from '../core/ports.js';

export interface AlertNotifier extends NotificationSink {
  // Posts an integration check message; false when the channel is unusable
  sendTestMessage(): Promise<boolean>;
}
