import { createLogger } from '../../utils/logger.js';
import { DAY_MS, formatPercent, formatUsd } from '../../utils/format.js';
import { AlertKind, AlertSeverity, type TvlDropCandidate } from '../../core/types/alerts.js';
import type { RuleContext } from './types.js';

const logger = createLogger('TvlDropRule');

export const TVL_LOOKBACK_MS = DAY_MS;

// Critical when TVL fell by at least the threshold against the sample 24h back
export function checkTvlDrop({ store, protocol, thresholds, now }: RuleContext): TvlDropCandidate | null {
  const latest = store.latest(protocol.id);
  if (!latest || latest.tvl === null) {
    return null;
  }

  const previous = store.asOf(protocol.id, new Date(now.getTime() - TVL_LOOKBACK_MS));
  if (!previous || previous.tvl === null || previous.tvl === 0) {
    logger.info(`No 24h historical data for ${protocol.id}, skipping TVL drop check`);
    return null;
  }

  const currentTvl = latest.tvl;
  const previousTvl = previous.tvl;
  const dropPercent = ((previousTvl - currentTvl) / previousTvl) * 100;

  if (dropPercent < thresholds.tvlDrop24hPercent) {
    return null;
  }

  return {
    protocolId: protocol.id,
    kind: AlertKind.TVL_DROP,
    severity: AlertSeverity.CRITICAL,
    message:
      `TVL dropped ${formatPercent(dropPercent)} in 24 hours ` +
      `(from $${formatUsd(previousTvl)} to $${formatUsd(currentTvl)})`,
    triggeredAt: now,
    details: { previousTvl, currentTvl, dropPercent },
  };
}
