import { describe, expect, it } from 'vitest';
import { STATUS_SYMBOLS, capacityStatus, trafficStatus, translateTrends } from '../src/services/trendTranslator.js';
import type { MetricSlots, NormalizedMetric } from '../src/types.js';

const THRESHOLDS = { warning: 70, critical: 85 };

function metric(currentValue: number, overrides: Partial<NormalizedMetric> = {}): NormalizedMetric {
  return {
    title: 'test widget',
    currentValue,
    comparisonPct: 0,
    trend: 'neutral',
    displayValue: String(currentValue),
    ...overrides,
  };
}

describe('translateTrends sentences', () => {
  it('describes traffic for both subsystems', () => {
    const result = translateTrends(
      {
        tsys_tps: metric(2500, { trend: 'up', comparisonPct: 12.34 }),
        hpns_tps: metric(900, { trend: 'down', comparisonPct: -5 }),
      },
      THRESHOLDS,
    );
    expect(result.trends).toEqual([
      'The TPS is 12.3% higher than last week for TSYS Mainframe; The TPS is 5.0% lower than last week for HPNS.',
    ]);
  });

  it('calls neutral traffic stable', () => {
    const result = translateTrends({ tsys_tps: metric(2500), hpns_tps: metric(900, { comparisonPct: 8 }) }, THRESHOLDS);
    expect(result.trends).toEqual(['The TPS is stable for TSYS Mainframe; The TPS is stable for HPNS.']);
  });

  it('skips the traffic sentence when a subsystem is missing', () => {
    expect(translateTrends({ tsys_tps: metric(2500, { trend: 'up' }) }, THRESHOLDS).trends).toEqual([]);
  });

  it('describes the ratio against last week', () => {
    expect(translateTrends({ tps_ratio: metric(35.4, { comparisonPct: -2 }) }, THRESHOLDS).trends).toEqual([
      'Requests that require data from HPNS have been approx. 35.4% of total, which is 2.0% lower than last week.',
    ]);
  });

  it('treats an unchanged ratio as higher', () => {
    expect(translateTrends({ tps_ratio: metric(40) }, THRESHOLDS).trends).toEqual([
      'Requests that require data from HPNS have been approx. 40.0% of total, which is 0.0% higher than last week.',
    ]);
  });

  it('names the subsystem above the critical threshold', () => {
    const result = translateTrends({ tsys_capacity: metric(90), hpns_capacity: metric(60) }, THRESHOLDS);
    expect(result.trends).toEqual([
      '⚠️ Capacity utilization is elevated at 90.0% for TSYS. Recommend monitoring closely.',
    ]);
    expect(result.capacityStatus).toBe('critical');
  });

  it('names HPNS when it holds the maximum and TSYS on ties', () => {
    expect(translateTrends({ tsys_capacity: metric(60), hpns_capacity: metric(86) }, THRESHOLDS).trends[0]).toBe(
      '⚠️ Capacity utilization is elevated at 86.0% for HPNS. Recommend monitoring closely.',
    );
    expect(translateTrends({ tsys_capacity: metric(88), hpns_capacity: metric(88) }, THRESHOLDS).trends[0]).toBe(
      '⚠️ Capacity utilization is elevated at 88.0% for TSYS. Recommend monitoring closely.',
    );
  });

  it('reports both values between the thresholds, inclusive at the warning boundary', () => {
    expect(translateTrends({ tsys_capacity: metric(70), hpns_capacity: metric(60) }, THRESHOLDS).trends).toEqual([
      'Capacity utilization is elevated but manageable (TSYS: 70.0%, HPNS: 60.0%). Monitoring trends.',
    ]);
  });

  it('rounds exact halves in capacity figures to even', () => {
    expect(translateTrends({ tsys_capacity: metric(72.25), hpns_capacity: metric(60.75) }, THRESHOLDS).trends).toEqual([
      'Capacity utilization is elevated but manageable (TSYS: 72.2%, HPNS: 60.8%). Monitoring trends.',
    ]);
  });

  it('reassures below the warning threshold', () => {
    expect(translateTrends({ tsys_capacity: metric(40), hpns_capacity: metric(55) }, THRESHOLDS).trends).toEqual([
      "Growth is closely matching last week's behavior. There are no capacity concerns at this time.",
    ]);
  });

  it('omits the capacity sentence when one capacity slot is missing', () => {
    const result = translateTrends({ tsys_capacity: metric(40) }, THRESHOLDS);
    expect(result.trends).toEqual([]);
  });

  it('orders sentences traffic, ratio, capacity', () => {
    const metrics: MetricSlots = {
      tsys_capacity: metric(40),
      hpns_capacity: metric(50),
      tps_ratio: metric(30, { comparisonPct: 1 }),
      hpns_tps: metric(900),
      tsys_tps: metric(2500),
    };
    const trends = translateTrends(metrics, THRESHOLDS).trends;
    expect(trends).toHaveLength(3);
    expect(trends[0]).toMatch(/^The TPS is stable for TSYS Mainframe/);
    expect(trends[1]).toMatch(/^Requests that require data from HPNS/);
    expect(trends[2]).toMatch(/^Growth is closely matching/);
  });
});

describe('trafficStatus', () => {
  it('is good when both subsystems clear their floors', () => {
    expect(translateTrends({ tsys_tps: metric(2500), hpns_tps: metric(900) }, THRESHOLDS).trafficStatus).toBe('good');
  });

  it('uses strict comparisons', () => {
    expect(trafficStatus(metric(2500), metric(800))).toBe('warning');
    expect(trafficStatus(metric(1000), metric(400))).toBe('critical');
    expect(trafficStatus(metric(1001), metric(0))).toBe('warning');
    expect(trafficStatus(metric(0), metric(401))).toBe('warning');
  });

  it('reads missing metrics as zero', () => {
    expect(trafficStatus(undefined, undefined)).toBe('critical');
    expect(translateTrends({}, THRESHOLDS).trafficStatus).toBe('critical');
  });
});

describe('capacityStatus', () => {
  it('never moves backwards as utilization rises', () => {
    const order = { good: 0, warning: 1, critical: 2 } as const;
    let previous = 0;
    for (let value = 0; value <= 100; value += 2.5) {
      const level = order[capacityStatus(metric(value), metric(0), THRESHOLDS)];
      expect(level).toBeGreaterThanOrEqual(previous);
      previous = level;
    }
    expect(previous).toBe(2);
  });

  it('is inclusive at both thresholds', () => {
    expect(capacityStatus(metric(69.9), undefined, THRESHOLDS)).toBe('good');
    expect(capacityStatus(metric(70), undefined, THRESHOLDS)).toBe('warning');
    expect(capacityStatus(undefined, metric(85), THRESHOLDS)).toBe('critical');
  });

  it('reads missing metrics as zero', () => {
    expect(capacityStatus(undefined, undefined, THRESHOLDS)).toBe('good');
  });
});

describe('STATUS_SYMBOLS', () => {
  it('maps levels to indicators', () => {
    expect(STATUS_SYMBOLS).toEqual({ good: '🟢', warning: '🟡', critical: '🔴' });
  });
});
