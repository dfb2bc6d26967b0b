import { formatPercent } from '../../utils/format.js';
import { AlertKind, AlertSeverity, type UtilizationHighCandidate } from '../../core/types/alerts.js';
import type { RuleContext } from './types.js';

// Lending protocols only; utilization is stored as a fraction
export function checkUtilizationHigh({
  store,
  protocol,
  thresholds,
  now,
}: RuleContext): UtilizationHighCandidate | null {
  if (protocol.type !== 'lending') {
    return null;
  }

  const latest = store.latest(protocol.id);
  if (!latest || latest.utilization === null) {
    return null;
  }

  const utilizationPercent = latest.utilization * 100;
  const threshold = thresholds.utilizationMaxPercent;

  if (utilizationPercent <= threshold) {
    return null;
  }

  return {
    protocolId: protocol.id,
    kind: AlertKind.UTILIZATION_HIGH,
    severity: AlertSeverity.WARNING,
    message:
      `Utilization rate critically high: ${formatPercent(utilizationPercent)} ` +
      `(threshold: ${formatPercent(threshold)})`,
    triggeredAt: now,
    details: { utilizationPercent, threshold },
  };
}
