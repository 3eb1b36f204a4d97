import React from 'react';
import { describe, it, expect } from 'vitest';
import { renderToStaticMarkup } from 'react-dom/server';
import ComparisonReport from '../components/ComparisonReport';
import MetricsCard from '../components/MetricsCard';
import { mergeQoeSeries } from '../components/QoeChart';
import { runComparison } from '../comparison';
import { createConfig, DEFAULT_CONFIG } from '../config';
import { renderReport } from '../renderReport';
import { NetworkType } from '../types';

const mount = (element: React.ReactElement): HTMLDivElement => {
  const container = document.createElement('div');
  container.innerHTML = renderToStaticMarkup(element);
  return container;
};

describe('Report components', () => {

  describe('MetricsCard', () => {
    it('should format numbers with the requested decimals', () => {
      const card = mount(<MetricsCard label="Latency" value={32} decimals={0} unit="steps" />);
      expect(card.textContent).toBe('Latency32steps');
    });

    it('should default to two decimals and pass text through', () => {
      expect(mount(<MetricsCard label="Power" value={24.4} />).textContent).toBe('Power24.40');
      expect(mount(<MetricsCard label="Power" value="n/a" subtext="no run" />).textContent).toBe('Powern/ano run');
    });
  });

  describe('ComparisonReport', () => {
    const outcomes = runComparison(DEFAULT_CONFIG);
    const page = mount(<ComparisonReport config={DEFAULT_CONFIG} outcomes={outcomes} />);

    it('should render a section per agent', () => {
      expect(Array.from(page.querySelectorAll('h2')).map(h => h.textContent)).toEqual(['Reactive', 'Myopic', 'PASS']);
    });

    it('should title every chart panel', () => {
      expect(Array.from(page.querySelectorAll('h3')).map(h => h.textContent)).toEqual([
        'Handover Latency (steps)',
        'Total Power Consumed (units)',
        "Kleinrock's Power (γ/T)",
        'Quality of Experience',
        'Device Activity Timeline'
      ]);
    });

    it('should draw the PASS staging transfer on the timeline', () => {
      expect(page.querySelector('[title="Transmit: t=30-45"]')).not.toBeNull();
      expect(page.querySelector('[title="Transmit: t=60-91"]')).not.toBeNull();
    });

    it('should render charts as SVG', () => {
      expect(page.querySelectorAll('svg.recharts-surface').length).toBeGreaterThanOrEqual(4);
    });

    it('should list failed runs', () => {
      const config = createConfig({ bandwidthMBps: { [NetworkType.FIVE_G]: 0 } });
      const failed = mount(<ComparisonReport config={config} outcomes={runComparison(config)} />);
      expect(Array.from(failed.querySelectorAll('h2')).map(h => h.textContent)).toEqual(['PASS']);
      expect(failed.textContent).toContain('Reactive failed: Cannot compute transfer duration: divisor is 0');
    });
  });

  describe('mergeQoeSeries', () => {
    it('should key each step by agent', () => {
      const runs = runComparison(DEFAULT_CONFIG).flatMap(o => (o.ok ? [o] : []));
      const rows = mergeQoeSeries(runs);
      expect(rows).toHaveLength(100);
      expect(rows[60]).toEqual({ timeStep: 60, Reactive: 1.5, Myopic: 1.5, PASS: 5 });
    });
  });

  it('should wrap the page in a standalone document', () => {
    const html = renderReport(DEFAULT_CONFIG, runComparison(DEFAULT_CONFIG));
    expect(html.split('\n').slice(0, 2)).toEqual(['<!DOCTYPE html>', '<html lang="en">']);
    expect(html.endsWith('</html>')).toBe(true);
  });
});
