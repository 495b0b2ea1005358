import Big from 'big.js';
import { checkMACrossover } from '../indicators/ma.js';
import type { SignalStrength, SignalType } from '../enums.js';
import type { IndicatorReading, IndicatorReadings, RuleOutcome } from '../types.js';

export const SIGNAL_STRATEGY = 'RSI_MA_MACD_Combined';

const RSI_OVERSOLD = 30;
const RSI_OVERBOUGHT = 70;
const STRONG_VOTE_THRESHOLD = 3;

/**
 * 투표 결과로부터 만들어진 신호 판단
 */
export interface SignalDecision {
  signalType: SignalType;
  strength: SignalStrength;
  confidence: number;
  rationale: string;
  indicatorsUsed: string[];
  buyVotes: number;
  sellVotes: number;
}

function primaryOf(reading: IndicatorReading | undefined): Big | null {
  if (!reading || reading.primary === null || !Number.isFinite(reading.primary)) return null;
  return new Big(reading.primary);
}

function secondaryOf(reading: IndicatorReading | undefined): Big | null {
  if (!reading || reading.secondary === null || !Number.isFinite(reading.secondary)) return null;
  return new Big(reading.secondary);
}

/**
 * RSI 규칙: < 30 매수, > 70 매도
 */
export function evaluateRsiRule(readings: IndicatorReadings): RuleOutcome | null {
  const rsi = primaryOf(readings.RSI_14);
  if (!rsi) return null;

  const base = { rule: 'RSI' as const, indicators: ['RSI_14'] };

  if (rsi.lt(RSI_OVERSOLD)) {
    return { ...base, vote: 'buy', fragment: `RSI oversold (${rsi.toFixed(1)})` };
  }
  if (rsi.gt(RSI_OVERBOUGHT)) {
    return { ...base, vote: 'sell', fragment: `RSI overbought (${rsi.toFixed(1)})` };
  }
  return { ...base, vote: null, fragment: null };
}

/**
 * 이동평균 규칙: SMA20 > SMA50 매수, SMA20 < SMA50 매도 (둘 다 있어야 평가)
 */
export function evaluateMaCrossoverRule(readings: IndicatorReadings): RuleOutcome | null {
  const sma20 = primaryOf(readings.SMA_20);
  const sma50 = primaryOf(readings.SMA_50);
  if (!sma20 || !sma50) return null;

  const base = { rule: 'MA_CROSSOVER' as const, indicators: ['SMA_20', 'SMA_50'] };

  switch (checkMACrossover(sma20, sma50)) {
    case 'golden':
      return { ...base, vote: 'buy', fragment: 'SMA 20 above SMA 50 (bullish trend)' };
    case 'death':
      return { ...base, vote: 'sell', fragment: 'SMA 20 below SMA 50 (bearish trend)' };
    case null:
      return { ...base, vote: null, fragment: null };
  }
}

/**
 * MACD 규칙: MACD > 시그널 && MACD > 0 매수, MACD < 시그널 && MACD < 0 매도
 */
export function evaluateMacdRule(readings: IndicatorReadings): RuleOutcome | null {
  const macdLine = primaryOf(readings.MACD_12_26_9);
  const signalLine = secondaryOf(readings.MACD_12_26_9);
  if (!macdLine || !signalLine) return null;

  const base = { rule: 'MACD' as const, indicators: ['MACD_12_26_9'] };

  if (macdLine.gt(signalLine) && macdLine.gt(0)) {
    return { ...base, vote: 'buy', fragment: 'MACD bullish crossover' };
  }
  if (macdLine.lt(signalLine) && macdLine.lt(0)) {
    return { ...base, vote: 'sell', fragment: 'MACD bearish crossover' };
  }
  return { ...base, vote: null, fragment: null };
}

function resolveDirectional(
  votes: number,
  side: 'buy' | 'sell'
): Pick<SignalDecision, 'signalType' | 'strength' | 'confidence'> {
  if (votes >= STRONG_VOTE_THRESHOLD) {
    return { signalType: side === 'buy' ? 'strong_buy' : 'strong_sell', strength: 'strong', confidence: 75 };
  }
  return { signalType: side, strength: 'moderate', confidence: 60 };
}

/**
 * RSI / 이동평균 / MACD 3개 규칙의 단순 투표로 신호 결정
 *
 * - 매수표 > 매도표: 3표 이상이면 strong_buy(75), 아니면 buy(60)
 * - 매도표 > 매수표: 대칭
 * - 동률(0:0 포함): hold(weak, 50)
 *
 * rationale 은 투표한 규칙의 문구를 규칙 순서대로 '; ' 로 잇는다.
 */
export function scoreSignal(readings: IndicatorReadings): SignalDecision {
  const outcomes = [
    evaluateRsiRule(readings),
    evaluateMaCrossoverRule(readings),
    evaluateMacdRule(readings),
  ].filter((o): o is RuleOutcome => o !== null);

  const buyVotes = outcomes.filter((o) => o.vote === 'buy').length;
  const sellVotes = outcomes.filter((o) => o.vote === 'sell').length;
  const indicatorsUsed = outcomes.flatMap((o) => o.indicators);
  const fragments = outcomes
    .map((o) => o.fragment)
    .filter((f): f is string => f !== null);

  if (buyVotes > sellVotes) {
    return {
      ...resolveDirectional(buyVotes, 'buy'),
      rationale: fragments.join('; '),
      indicatorsUsed,
      buyVotes,
      sellVotes,
    };
  }

  if (sellVotes > buyVotes) {
    return {
      ...resolveDirectional(sellVotes, 'sell'),
      rationale: fragments.join('; '),
      indicatorsUsed,
      buyVotes,
      sellVotes,
    };
  }

  const tieNote = buyVotes === 0 ? 'No clear signals' : 'Mixed signals';

  return {
    signalType: 'hold',
    strength: 'weak',
    confidence: 50,
    rationale: [...fragments, tieNote].join('; '),
    indicatorsUsed,
    buyVotes,
    sellVotes,
  };
}
