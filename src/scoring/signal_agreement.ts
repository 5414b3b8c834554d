/**
 * Signal agreement: how many sub-signals point the same (bullish) way.
 * A sub-signal above 50 counts as bullish. Each pillar contributes the share
 * of its bullish sub-signals; the pillars are averaged with equal weight.
 */

import { weightedAverage } from './aggregate';
import { roundScore } from './normalize';
import { PILLARS, type SignalAgreement, type SubSignals } from './types';

const BULLISH_ABOVE = 50;

function bullishShare(signals: Readonly<Record<string, number>>): number {
  const values = Object.values(signals);
  if (values.length === 0) return 0;
  const bullish = values.filter((v) => v > BULLISH_ABOVE).length;
  return (bullish / values.length) * 100;
}

export function calculateSignalAgreement(subSignals: SubSignals): SignalAgreement {
  const shares = PILLARS.map((pillar) => bullishShare(subSignals[pillar]));
  const agreement = roundScore(weightedAverage(shares) ?? 0);
  // Strong agreement in either direction
  const conviction = agreement > 75 || agreement < 25 ? 'HIGH' : 'MEDIUM';
  return { agreement, conviction };
}
