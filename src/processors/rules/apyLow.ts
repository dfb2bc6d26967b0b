import { formatPercent } from '../../utils/format.js';
import { AlertKind, AlertSeverity, type ApyLowCandidate } from '../../core/types/alerts.js';
import type { RuleContext } from './types.js';

export function checkApyLow({ store, protocol, thresholds, now }: RuleContext): ApyLowCandidate | null {
  const latest = store.latest(protocol.id);
  if (!latest || latest.apy7d === null) {
    return null;
  }

  const apy = latest.apy7d;
  const threshold = thresholds.apyMinPercent;

  if (apy >= threshold) {
    return null;
  }

  return {
    protocolId: protocol.id,
    kind: AlertKind.APY_LOW,
    severity: AlertSeverity.WARNING,
    message: `APY dropped below threshold: ${formatPercent(apy)} (threshold: ${formatPercent(threshold)})`,
    triggeredAt: now,
    details: { apy, threshold },
  };
}
