import { describe, it, expect } from 'vitest';

import { buildView, TABLE_METRICS } from '../view';
import { createRandomSource } from '../../random/random-source';
import type {
  ChartView,
  ImageView,
  TableView,
  View,
} from '../../types/publication';
import {
  createTestContext,
  createTestTermBank,
  FIXED_NOW,
} from '../../test-utils/fixtures';

function asImage(view: View): ImageView {
  if (view.type !== 'image') throw new Error(`expected image, got ${view.type}`);
  return view;
}

function asChart(view: View): ChartView {
  if (view.type !== 'chart') throw new Error(`expected chart, got ${view.type}`);
  return view;
}

function asTable(view: View): TableView {
  if (view.type !== 'table') throw new Error(`expected table, got ${view.type}`);
  return view;
}

describe('buildView', () => {
  it('text views hold two 2000-character paragraphs', () => {
    const view = buildView({ kind: 'text' }, createTestContext());
    expect(view.type).toBe('text');
    if (view.type !== 'text') return;
    expect(view.content).toMatch(/^<p>[a-z ]{2000}<\/p><p>[a-z ]{2000}<\/p>$/);
  });

  it('image views are numbered and carry base64 filler', () => {
    const view = asImage(
      buildView(
        { kind: 'image', imageIndex: 3, base64Multiplier: 2 },
        createTestContext()
      )
    );
    expect(view.mediaType).toBe('image/png');
    expect(view.alt).toBe('Investment chart 3');
    expect(view.caption.startsWith('Figure 3: ')).toBe(true);
    expect(view.caption).toHaveLength('Figure 3: '.length + 150);
    expect(view.content.startsWith('Chart showing ')).toBe(true);
    expect(view.content).toHaveLength('Chart showing '.length + 100);
    expect(view.base64).toHaveLength(2048);
  });

  it('chart views cover the twelve months of the report year', () => {
    const view = asChart(buildView({ kind: 'chart' }, createTestContext('min')));
    expect(view.spec.type).toBe('line');
    expect(view.spec.data.values.map((point) => point.date)).toEqual([
      '2024-01',
      '2024-02',
      '2024-03',
      '2024-04',
      '2024-05',
      '2024-06',
      '2024-07',
      '2024-08',
      '2024-09',
      '2024-10',
      '2024-11',
      '2024-12',
    ]);
    expect(view.spec.data.values[0]).toEqual({
      date: '2024-01',
      value: 100,
      benchmark: 95,
    });
    expect(view.spec.encoding).toEqual({
      x: { field: 'date', type: 'temporal' },
      y: { field: 'value', type: 'quantitative' },
      color: { field: 'series', type: 'nominal' },
    });
  });

  it('chart values stay within their ranges', () => {
    const ctx = {
      random: createRandomSource(1234),
      termBank: createTestTermBank(),
      now: FIXED_NOW,
    };
    for (let i = 0; i < 20; i++) {
      for (const point of asChart(buildView({ kind: 'chart' }, ctx)).spec.data
        .values) {
        expect(point.value).toBeGreaterThanOrEqual(100);
        expect(point.value).toBeLessThanOrEqual(200);
        expect(point.benchmark).toBeGreaterThanOrEqual(95);
        expect(point.benchmark).toBeLessThanOrEqual(195);
      }
    }
  });

  it('table views have a metric column and four quarterly columns', () => {
    const view = asTable(buildView({ kind: 'table' }, createTestContext('max')));
    expect(view.columns).toEqual([
      { key: 'metric', title: 'Metric', type: 'string' },
      { key: 'q1', title: 'Q1 2024', type: 'number', format: '.2f' },
      { key: 'q2', title: 'Q2 2024', type: 'number', format: '.2f' },
      { key: 'q3', title: 'Q3 2024', type: 'number', format: '.2f' },
      { key: 'q4', title: 'Q4 2024', type: 'number', format: '.2f' },
    ]);
    expect(view.rows).toEqual([
      { metric: 'Revenue Growth', q1: 15, q2: 15, q3: 15, q4: 15 },
      { metric: 'Profit Margin', q1: 25, q2: 25, q3: 25, q4: 25 },
      { metric: 'ROE', q1: 20, q2: 20, q3: 20, q4: 20 },
    ]);
  });

  it('table values stay within each metric range', () => {
    const ctx = {
      random: createRandomSource(99),
      termBank: createTestTermBank(),
      now: FIXED_NOW,
    };
    for (let i = 0; i < 20; i++) {
      const { rows } = asTable(buildView({ kind: 'table' }, ctx));
      rows.forEach((row, index) => {
        const [min, max] = TABLE_METRICS[index]?.range ?? ([0, 0] as const);
        for (const value of [row.q1, row.q2, row.q3, row.q4]) {
          expect(value).toBeGreaterThanOrEqual(min);
          expect(value).toBeLessThanOrEqual(max);
        }
      });
    }
  });
});
