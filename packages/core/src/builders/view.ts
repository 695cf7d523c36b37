/**
 * View builder: one leaf content unit per request.
 *
 * Chart values fall within 100..200 and benchmarks within 95..195.
 */

import type {
  ChartPoint,
  ChartView,
  ImageView,
  QuarterKey,
  TableColumn,
  TableRow,
  TableView,
  TextView,
  View,
} from '../types/publication';
import { base64Filler, randomText } from '../synth/text';
import { pad, type BuildContext } from './context';

export type ViewRequest =
  | { kind: 'text' }
  | { kind: 'chart' }
  | { kind: 'table' }
  | { kind: 'image'; imageIndex: number; base64Multiplier: number };

export const REPORT_YEAR = 2024;

export const TEXT_PARAGRAPH_LENGTH = 2000;
export const IMAGE_CONTENT_LENGTH = 100;
export const IMAGE_CAPTION_LENGTH = 150;

export const CHART_VALUE_RANGE = [100, 200] as const;
export const CHART_BENCHMARK_RANGE = [95, 195] as const;

export interface TableMetric {
  readonly metric: string;
  readonly range: readonly [min: number, max: number];
}

/** Metric rows of every table view with the range each quarter is drawn from. */
export const TABLE_METRICS: readonly TableMetric[] = [
  { metric: 'Revenue Growth', range: [-5, 15] },
  { metric: 'Profit Margin', range: [5, 25] },
  { metric: 'ROE', range: [8, 20] },
];

const QUARTERS: readonly QuarterKey[] = ['q1', 'q2', 'q3', 'q4'];

const TABLE_COLUMNS: readonly TableColumn[] = [
  { key: 'metric', title: 'Metric', type: 'string' },
  ...QUARTERS.map(
    (key, i): TableColumn => ({
      key,
      title: `Q${i + 1} ${REPORT_YEAR}`,
      type: 'number',
      format: '.2f',
    })
  ),
];

export function buildView(request: ViewRequest, ctx: BuildContext): View {
  switch (request.kind) {
    case 'text':
      return buildTextView(ctx);
    case 'image':
      return buildImageView(request.imageIndex, request.base64Multiplier, ctx);
    case 'chart':
      return buildChartView(ctx);
    case 'table':
      return buildTableView(ctx);
  }
}

function buildTextView({ random, termBank }: BuildContext): TextView {
  const first = randomText(termBank.terms, TEXT_PARAGRAPH_LENGTH, random);
  const second = randomText(termBank.terms, TEXT_PARAGRAPH_LENGTH, random);
  return { type: 'text', content: `<p>${first}</p><p>${second}</p>` };
}

function buildImageView(
  imageIndex: number,
  base64Multiplier: number,
  { random, termBank }: BuildContext
): ImageView {
  return {
    type: 'image',
    content: `Chart showing ${randomText(termBank.terms, IMAGE_CONTENT_LENGTH, random)}`,
    mediaType: 'image/png',
    base64: base64Filler(base64Multiplier),
    alt: `Investment chart ${imageIndex}`,
    caption: `Figure ${imageIndex}: ${randomText(termBank.terms, IMAGE_CAPTION_LENGTH, random)}`,
  };
}

function buildChartView({ random }: BuildContext): ChartView {
  const values: ChartPoint[] = [];
  for (let month = 1; month <= 12; month++) {
    values.push({
      date: `${REPORT_YEAR}-${pad(month, 2)}`,
      value: random.float(...CHART_VALUE_RANGE),
      benchmark: random.float(...CHART_BENCHMARK_RANGE),
    });
  }
  return {
    type: 'chart',
    spec: {
      type: 'line',
      data: { values },
      encoding: {
        x: { field: 'date', type: 'temporal' },
        y: { field: 'value', type: 'quantitative' },
        color: { field: 'series', type: 'nominal' },
      },
    },
  };
}

function buildTableView({ random }: BuildContext): TableView {
  const rows: TableRow[] = TABLE_METRICS.map(({ metric, range }) => ({
    metric,
    q1: random.float(...range),
    q2: random.float(...range),
    q3: random.float(...range),
    q4: random.float(...range),
  }));
  return { type: 'table', columns: TABLE_COLUMNS, rows };
}
