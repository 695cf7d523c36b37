/**
 * Document model for generated investment publications.
 *
 * Records are assembled bottom-up by the builders and serialized once.
 */

export const PUBLICATION_TYPES = [
  'quarterly_report',
  'thematic_report',
  'strategy_note',
  'market_commentary',
  'research_note',
] as const;
export type PublicationType = (typeof PUBLICATION_TYPES)[number];

export const TARGET_AUDIENCES = ['institutional', 'retail', 'internal'] as const;
export type TargetAudience = (typeof TARGET_AUDIENCES)[number];

export const BLOCK_TYPES = [
  'textual',
  'figure',
  'table',
  'composite',
  'custom',
] as const;
export type BlockType = (typeof BLOCK_TYPES)[number];

export const RISK_PROFILES = ['Conservative', 'Moderate', 'Aggressive'] as const;
export type RiskProfile = (typeof RISK_PROFILES)[number];

export const TIME_HORIZONS = ['Short-term', 'Medium-term', 'Long-term'] as const;
export type TimeHorizon = (typeof TIME_HORIZONS)[number];

export const NOTE_ROLES = [
  'author',
  'editor',
  'reviewer',
  'lead_author',
  'contributor',
] as const;
export type NoteRole = (typeof NOTE_ROLES)[number];

export const NOTE_STATUSES = ['open', 'resolved', 'closed'] as const;
export type NoteStatus = (typeof NOTE_STATUSES)[number];

export const VIEW_KINDS = ['text', 'image', 'chart', 'table'] as const;
export type ViewKind = (typeof VIEW_KINDS)[number];

export interface Metadata {
  readonly assetClasses: readonly string[];
  readonly companies: readonly string[];
  readonly instruments: readonly string[];
  readonly sectors: readonly string[];
  readonly regions: readonly string[];
  readonly riskProfile: RiskProfile;
  readonly timeHorizon: TimeHorizon;
  readonly tags: readonly string[];
}

export interface Note {
  readonly id: string;
  readonly author: string;
  readonly role: NoteRole;
  readonly timestamp: string;
  readonly status: NoteStatus;
  readonly text: string;
}

export interface TextView {
  readonly type: 'text';
  readonly content: string;
}

export interface ImageView {
  readonly type: 'image';
  readonly content: string;
  readonly mediaType: 'image/png';
  readonly base64: string;
  readonly alt: string;
  readonly caption: string;
}

export interface ChartPoint {
  readonly date: string;
  readonly value: number;
  readonly benchmark: number;
}

export interface ChartEncodingChannel {
  readonly field: string;
  readonly type: 'temporal' | 'quantitative' | 'nominal';
}

export interface ChartView {
  readonly type: 'chart';
  readonly spec: {
    readonly type: 'line';
    readonly data: { readonly values: readonly ChartPoint[] };
    readonly encoding: {
      readonly x: ChartEncodingChannel;
      readonly y: ChartEncodingChannel;
      readonly color: ChartEncodingChannel;
    };
  };
}

export interface TableColumn {
  readonly key: 'metric' | QuarterKey;
  readonly title: string;
  readonly type: 'string' | 'number';
  readonly format?: string;
}

export type QuarterKey = 'q1' | 'q2' | 'q3' | 'q4';

export type TableRow = { readonly metric: string } & {
  readonly [K in QuarterKey]: number;
};

export interface TableView {
  readonly type: 'table';
  readonly columns: readonly TableColumn[];
  readonly rows: readonly TableRow[];
}

export type View = TextView | ImageView | ChartView | TableView;

/** Fields shared by publications, chapters and blocks. */
interface DocumentNode {
  readonly id: string;
  readonly title: string;
  readonly subtitle: string;
  readonly summary: string;
  readonly metadata: Metadata;
  readonly notes: readonly Note[];
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly authors: readonly string[];
  readonly language: 'en';
}

export interface Block extends DocumentNode {
  readonly type: BlockType;
  readonly views: readonly View[];
}

export interface Chapter extends DocumentNode {
  readonly blocks: readonly Block[];
  readonly order: number;
}

export interface Publication extends DocumentNode {
  readonly type: PublicationType;
  readonly targetAudience: TargetAudience;
  readonly status: 'published';
  readonly version: string;
  readonly publishedAt: string;
  readonly chapters: readonly Chapter[];
}

export interface PublicationDocument {
  readonly publications: readonly Publication[];
}
