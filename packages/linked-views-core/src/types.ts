/**
 * Type definitions for the linked-views core.
 * Defines the dataset model, predicates, chart specifications and the
 * artifacts handed to external display surfaces.
 */

// --- Dataset ---

export type ColumnType = 'categorical' | 'numeric' | 'temporal' | 'key';

export type CellValue = string | number | boolean | Date | null;

export type RowKey = string | number;

export type Row = Readonly<Record<string, CellValue>>;

export interface ColumnDef {
  name: string;
  type: ColumnType;
  /** Display label. Defaults to the column name. */
  label?: string;
}

/**
 * A computed column addressed by predicates and widgets.
 * Valid against a dataset when every `dependsOn` column exists.
 */
export interface DerivedColumn {
  id: string;
  dependsOn: Array<string>;
  compute: (row: Row) => CellValue;
  /** Column name in an external SQL source, used by SQL export. */
  sqlColumn?: string;
}

export type ColumnRef = string | DerivedColumn;

/**
 * The capability set shared by datasets and their filtered projections.
 */
export interface TabularSource {
  readonly name: string;
  readonly columns: ReadonlyArray<ColumnDef>;
  getRows: () => ReadonlyArray<Row>;
  getColumn: (name: string) => ReadonlyArray<CellValue>;
  rowCount: () => number;
  keyOf: (row: Row) => RowKey;
  hasColumn: (name: string) => boolean;
  hasKey: (key: RowKey) => boolean;
  getColumnDef: (name: string) => ColumnDef | undefined;
}

// --- Predicates ---

export type RangeBound = number | Date | null;

export interface MembershipPredicate {
  type: 'membership';
  column: ColumnRef;
  values: ReadonlyArray<CellValue>;
}

export interface RangePredicate {
  type: 'range';
  column: ColumnRef;
  min: RangeBound;
  max: RangeBound;
}

export interface EqualsPredicate {
  type: 'equals';
  column: ColumnRef;
  value: CellValue;
}

export interface TextPredicate {
  type: 'text';
  column: ColumnRef;
  query: string;
  caseSensitive?: boolean;
}

export type Predicate =
  | MembershipPredicate
  | RangePredicate
  | EqualsPredicate
  | TextPredicate;

export type PredicateType = Predicate['type'];

// --- Selection ---

/**
 * A single contribution to the selection state.
 * Filter contributions narrow the rows; highlight contributions emphasize rows.
 */
export type SelectionInput =
  | { predicate: Predicate }
  | { keys: Iterable<RowKey> };

export interface FilterClause {
  sourceId: string;
  predicate: Predicate;
}

export interface HighlightClause {
  sourceId: string;
  keys: ReadonlyArray<RowKey>;
}

export type HighlightResolution = 'union' | 'single';

export interface SelectionSnapshot {
  /** Monotonic counter, bumped on every accepted change. */
  version: number;
  filters: ReadonlyArray<FilterClause>;
  highlights: ReadonlyArray<HighlightClause>;
  /** Keys of rows passing every filter. */
  filteredKeys: ReadonlySet<RowKey>;
  /** Keys emphasized by click/brush interactions. Null when none is active. */
  highlightedKeys: ReadonlySet<RowKey> | null;
  /** Source of the most recent accepted change. */
  lastSourceId: string | null;
}

export type SelectionListener = (snapshot: SelectionSnapshot) => void;

/**
 * The read-only port views and widgets receive.
 * Only the owning link group can write through `update`.
 */
export interface SelectionPort {
  readonly dataset: TabularSource;
  getSnapshot: () => SelectionSnapshot;
  update: (sourceId: string, input: SelectionInput | null) => void;
  reset: (sourceId: string) => void;
  /** Keys passing every filter except the given source's own. */
  keysExcluding: (sourceId: string) => ReadonlySet<RowKey>;
  /** Stops notifying a participant. */
  release: (participant: SelectionParticipant) => void;
}

/**
 * Anything a link group notifies on selection changes (views, widgets).
 */
export interface SelectionParticipant {
  readonly id: string;
  handleSelectionChange: (snapshot: SelectionSnapshot) => void;
}

// --- Chart specification ---

export type Channel = 'x' | 'y' | 'color' | 'size' | 'group';

export type MarkType = 'point' | 'line' | 'bar' | 'area' | 'rect' | 'text';

export interface ChartStyle {
  color?: string;
  highlightColor?: string;
  opacity?: number;
  dimOpacity?: number;
  width?: number;
  height?: number;
}

/** The channel mapping of a constructed view, frozen with it. */
export type ChannelMapping = Readonly<Partial<Record<Channel, string>>> & {
  readonly tooltip?: ReadonlyArray<string>;
};

export interface ChartSpec {
  mark?: MarkType;
  channels: Partial<Record<Channel, string>> & { tooltip?: Array<string> };
  style?: ChartStyle;
  title?: string;
}

// --- Rendering ---

export interface RenderedMark {
  key: RowKey;
  x: CellValue;
  y: CellValue;
  color: CellValue;
  size: CellValue;
  group: CellValue;
  tooltip: Record<string, CellValue>;
  highlighted: boolean;
  opacity: number;
  fill: string;
}

export interface RenderedArtifact {
  viewId: string;
  version: number;
  title?: string;
  mark: MarkType;
  dimensions: { width: number; height: number };
  channels: ChannelMapping;
  marks: ReadonlyArray<RenderedMark>;
  rowCount: number;
  empty: boolean;
  highlightedKeys: ReadonlyArray<RowKey>;
}

/**
 * External display surface for a view.
 * `draw` may be asynchronous; its output is committed only while still current.
 */
export interface ArtifactRenderer<TOutput = unknown> {
  draw: (artifact: RenderedArtifact) => TOutput | Promise<TOutput>;
  commit?: (output: TOutput, artifact: RenderedArtifact) => void;
}

// --- Interactions ---

export type Interval = readonly [number | Date, number | Date];

export type InteractionEvent =
  | { type: 'click'; key: RowKey | null; additive?: boolean }
  | { type: 'brush'; x?: Interval; y?: Interval }
  | { type: 'lasso'; polygon: ReadonlyArray<readonly [number, number]> }
  | {
      type: 'legend';
      channel: Channel;
      value: CellValue;
      additive?: boolean;
    }
  | { type: 'clear' };
