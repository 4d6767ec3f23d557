import {
  InvalidChannelMapping,
  InvalidPredicate,
  LinkedViewsError,
} from './errors';
import { logger } from './logger';
import { chartSpecSchema } from './schema';
import { cellEquals, toComparable } from './validation';
import type { ResolvedChartSpec, ResolvedChartStyle } from './schema';
import type {
  ArtifactRenderer,
  CellValue,
  Channel,
  ChannelMapping,
  ChartSpec,
  InteractionEvent,
  Interval,
  MarkType,
  RenderedArtifact,
  RenderedMark,
  Row,
  RowKey,
  SelectionParticipant,
  SelectionPort,
  SelectionSnapshot,
  TabularSource,
} from './types';

export interface ViewOptions<TOutput = unknown> {
  id?: string;
  /** Display surface invoked on every selection change. */
  renderer?: ArtifactRenderer<TOutput>;
}

export interface FrozenChartSpec {
  readonly mark: MarkType;
  readonly channels: ChannelMapping;
  readonly style: Readonly<ResolvedChartStyle>;
  readonly title?: string;
}

const CHANNELS: ReadonlyArray<Channel> = ['x', 'y', 'color', 'size', 'group'];

let viewCounter = 0;

/**
 * Binds a chart specification to a dataset and, optionally, a link group's
 * selection.
 *
 * With a selection, `render()` reflects the current filter and highlight.
 * Without one (static charts), it renders the full dataset through the same
 * code path.
 */
export class View<TOutput = unknown> implements SelectionParticipant {
  public readonly id: string;
  public readonly spec: FrozenChartSpec;
  public readonly dataset: TabularSource;

  private readonly selection: SelectionPort | null;
  private readonly renderer: ArtifactRenderer<TOutput> | undefined;
  private cached: RenderedArtifact | null = null;
  private committed: RenderedArtifact | null = null;
  private disposed = false;

  constructor(
    spec: ChartSpec,
    dataset: TabularSource,
    selection: SelectionPort | null,
    options: ViewOptions<TOutput> = {},
  ) {
    this.id = options.id ?? `view-${++viewCounter}`;

    const parsed = chartSpecSchema.safeParse(spec);
    if (!parsed.success) {
      throw new LinkedViewsError(
        `[View] "${this.id}" has an invalid chart spec: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
        { cause: parsed.error },
      );
    }

    for (const channel of CHANNELS) {
      const column = parsed.data.channels[channel];
      if (column !== undefined && !dataset.hasColumn(column)) {
        throw new InvalidChannelMapping(channel, column, dataset.name);
      }
    }
    for (const column of parsed.data.channels.tooltip ?? []) {
      if (!dataset.hasColumn(column)) {
        throw new InvalidChannelMapping('tooltip', column, dataset.name);
      }
    }

    if (selection !== null && selection.dataset !== dataset) {
      throw new LinkedViewsError(
        `[View] "${this.id}" and its selection are bound to different datasets.`,
      );
    }

    this.spec = freezeSpec(parsed.data);
    this.dataset = dataset;
    this.selection = selection;
    this.renderer = options.renderer;
  }

  get isLinked(): boolean {
    return this.selection !== null;
  }

  /**
   * Builds the artifact for the current selection snapshot.
   * Repeated calls at the same snapshot version return the same artifact.
   */
  render(): RenderedArtifact {
    const snapshot = this.selection?.getSnapshot() ?? null;
    const version = snapshot?.version ?? 0;

    if (this.cached && this.cached.version === version) {
      return this.cached;
    }

    const highlight = snapshot?.highlightedKeys ?? null;
    const { channels, style } = this.spec;
    const marks: Array<RenderedMark> = [];
    const highlightedKeys: Array<RowKey> = [];

    for (const row of this.visibleRows(snapshot)) {
      const key = this.dataset.keyOf(row);
      const highlighted = highlight !== null && highlight.has(key);
      if (highlighted) {
        highlightedKeys.push(key);
      }

      const tooltip: Record<string, CellValue> = {};
      for (const column of channels.tooltip ?? []) {
        tooltip[column] = row[column] ?? null;
      }

      marks.push({
        key,
        x: read(row, channels.x),
        y: read(row, channels.y),
        color: read(row, channels.color),
        size: read(row, channels.size),
        group: read(row, channels.group),
        tooltip,
        highlighted,
        opacity:
          highlight === null || highlighted ? style.opacity : style.dimOpacity,
        fill: highlighted ? style.highlightColor : style.color,
      });
    }

    const artifact: RenderedArtifact = Object.freeze({
      viewId: this.id,
      version,
      title: this.spec.title,
      mark: this.spec.mark,
      dimensions: { width: style.width, height: style.height },
      channels,
      marks: Object.freeze(marks),
      rowCount: marks.length,
      empty: marks.length === 0,
      highlightedKeys: Object.freeze(highlightedKeys),
    });

    this.cached = artifact;
    return artifact;
  }

  /**
   * Translates a user interaction into a highlight key set and writes it to
   * the link group. Throws InvalidPredicate for malformed interactions.
   */
  onInteract(event: InteractionEvent): void {
    if (!this.selection) {
      logger.debug(
        'View',
        `[View] "${this.id}" is static. Ignoring ${event.type}.`,
      );
      return;
    }
    if (this.disposed) {
      return;
    }

    switch (event.type) {
      case 'clear':
        this.selection.reset(this.id);
        return;

      case 'click': {
        if (event.key === null) {
          this.selection.reset(this.id);
          return;
        }
        if (!this.dataset.hasKey(event.key)) {
          throw new InvalidPredicate(
            `[View] "${this.id}" received a click on unknown key "${String(event.key)}".`,
            { sourceId: this.id },
          );
        }
        if (event.additive) {
          this.writeToggled([event.key]);
        } else {
          this.write([event.key]);
        }
        return;
      }

      case 'brush': {
        const keys = this.brushKeys(event.x, event.y);
        logger.debounce(
          `brush:${this.id}`,
          100,
          'debug',
          'View',
          `[View] "${this.id}" brushed ${keys.length} rows`,
        );
        this.write(keys);
        return;
      }

      case 'lasso':
        this.write(this.lassoKeys(event.polygon));
        return;

      case 'legend': {
        const column = this.spec.channels[event.channel];
        if (column === undefined) {
          throw new InvalidPredicate(
            `[View] "${this.id}" has no "${event.channel}" channel for a legend selection.`,
            { sourceId: this.id },
          );
        }
        const keys = this.visibleRows(this.selection.getSnapshot())
          .filter((row) => cellEquals(row[column] ?? null, event.value))
          .map((row) => this.dataset.keyOf(row));
        if (event.additive) {
          this.writeToggled(keys);
        } else {
          this.write(keys);
        }
        return;
      }
    }
  }

  handleSelectionChange(_snapshot: SelectionSnapshot): void {
    if (this.renderer && !this.disposed) {
      void this.refresh();
    }
  }

  /**
   * Renders and hands the artifact to the renderer.
   * Resolves false when the output was discarded because a newer selection
   * arrived while an asynchronous draw was pending, or when drawing failed.
   */
  async refresh(): Promise<boolean> {
    if (!this.renderer) {
      return false;
    }
    const artifact = this.render();
    try {
      const drawn = this.renderer.draw(artifact);
      const output = isPromise(drawn) ? await drawn : drawn;

      if (this.disposed || artifact.version !== this.currentVersion()) {
        logger.debug(
          'View',
          `[View] "${this.id}" discarded stale render of version ${artifact.version}`,
        );
        return false;
      }

      this.renderer.commit?.(output, artifact);
      this.committed = artifact;
      return true;
    } catch (error) {
      logger.error('View', `[View] "${this.id}" render failed`, {
        error: String(error),
      });
      return false;
    }
  }

  /**
   * The artifact most recently committed to the renderer.
   */
  getCommittedArtifact(): RenderedArtifact | null {
    return this.committed;
  }

  /**
   * Detaches the view from its link group and drops its highlight.
   * It can be attached again.
   */
  detach(): void {
    this.selection?.release(this);
  }

  /**
   * Detaches the view for good. Later interactions and renderer output are
   * ignored.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.detach();
  }

  private currentVersion(): number {
    return this.selection?.getSnapshot().version ?? 0;
  }

  private visibleRows(snapshot: SelectionSnapshot | null): Array<Row> {
    const rows = this.dataset.getRows();
    if (!snapshot) {
      return [...rows];
    }
    return rows.filter((row) =>
      snapshot.filteredKeys.has(this.dataset.keyOf(row)),
    );
  }

  private ownKeys(): ReadonlyArray<RowKey> {
    const clause = this.selection
      ?.getSnapshot()
      .highlights.find((h) => h.sourceId === this.id);
    return clause?.keys ?? [];
  }

  private write(keys: ReadonlyArray<RowKey>) {
    // An empty key set is still an active highlight: everything dims.
    this.selection?.update(this.id, { keys });
  }

  /**
   * Toggles keys within this view's own highlight. Emptying it resets.
   */
  private writeToggled(keys: ReadonlyArray<RowKey>) {
    const next = toggle(this.ownKeys(), keys);
    if (next.length === 0) {
      this.selection?.reset(this.id);
    } else {
      this.write(next);
    }
  }

  private numericChannel(channel: 'x' | 'y'): string {
    const column = this.spec.channels[channel];
    if (column === undefined) {
      throw new InvalidPredicate(
        `[View] "${this.id}" has no "${channel}" channel to select on.`,
        { sourceId: this.id },
      );
    }
    const type = this.dataset.getColumnDef(column)?.type;
    if (type !== 'numeric' && type !== 'temporal') {
      throw new InvalidPredicate(
        `[View] "${this.id}" cannot select an interval on ${type ?? 'unknown'} column "${column}".`,
        { column, sourceId: this.id },
      );
    }
    return column;
  }

  private brushKeys(x?: Interval, y?: Interval): Array<RowKey> {
    if (!x && !y) {
      throw new InvalidPredicate(
        `[View] "${this.id}" received a brush without an interval.`,
        { sourceId: this.id },
      );
    }
    const tests: Array<(row: Row) => boolean> = [];
    for (const [channel, interval] of [
      ['x', x],
      ['y', y],
    ] as const) {
      if (!interval) continue;
      const column = this.numericChannel(channel);
      const [lo, hi] = normalizeInterval(interval, column, this.id);
      tests.push((row) => {
        const value = toComparable(row[column] ?? null);
        return value !== null && value >= lo && value <= hi;
      });
    }
    return this.visibleRows(this.selection?.getSnapshot() ?? null)
      .filter((row) => tests.every((test) => test(row)))
      .map((row) => this.dataset.keyOf(row));
  }

  private lassoKeys(
    polygon: ReadonlyArray<readonly [number, number]>,
  ): Array<RowKey> {
    if (polygon.length < 3) {
      throw new InvalidPredicate(
        `[View] "${this.id}" received a lasso with fewer than 3 vertices.`,
        { sourceId: this.id },
      );
    }
    const xColumn = this.numericChannel('x');
    const yColumn = this.numericChannel('y');
    return this.visibleRows(this.selection?.getSnapshot() ?? null)
      .filter((row) => {
        const px = toComparable(row[xColumn] ?? null);
        const py = toComparable(row[yColumn] ?? null);
        return px !== null && py !== null && pointInPolygon(px, py, polygon);
      })
      .map((row) => this.dataset.keyOf(row));
  }
}

function read(row: Row, column: string | undefined): CellValue {
  return column === undefined ? null : (row[column] ?? null);
}

function isPromise<T>(value: T | Promise<T>): value is Promise<T> {
  return value instanceof Promise;
}

/**
 * Symmetric difference: keys already present are removed, others added.
 */
function toggle(
  current: ReadonlyArray<RowKey>,
  keys: ReadonlyArray<RowKey>,
): Array<RowKey> {
  const next = new Set(current);
  const allPresent = keys.length > 0 && keys.every((k) => next.has(k));
  for (const key of keys) {
    if (allPresent) {
      next.delete(key);
    } else {
      next.add(key);
    }
  }
  return [...next];
}

function normalizeInterval(
  interval: Interval,
  column: string,
  viewId: string,
): [number, number] {
  const a = toComparable(interval[0]);
  const b = toComparable(interval[1]);
  if (a === null || b === null) {
    throw new InvalidPredicate(
      `[View] "${viewId}" received a malformed interval on "${column}".`,
      { column, sourceId: viewId },
    );
  }
  return a <= b ? [a, b] : [b, a];
}

/**
 * Ray casting: counts edge crossings of a horizontal ray from the point.
 */
export function pointInPolygon(
  x: number,
  y: number,
  polygon: ReadonlyArray<readonly [number, number]>,
): boolean {
  let inside = false;
  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const vi = polygon[i];
    const vj = polygon[j];
    if (!vi || !vj) continue;
    const [xi, yi] = vi;
    const [xj, yj] = vj;
    const crosses =
      yi > y !== yj > y && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi;
    if (crosses) {
      inside = !inside;
    }
  }
  return inside;
}

function freezeSpec(spec: ResolvedChartSpec): FrozenChartSpec {
  const { tooltip, ...mapped } = spec.channels;
  const channels: ChannelMapping = Object.freeze(
    tooltip === undefined
      ? mapped
      : { ...mapped, tooltip: Object.freeze([...tooltip]) },
  );
  return Object.freeze({
    mark: spec.mark,
    channels,
    style: Object.freeze({ ...spec.style }),
    title: spec.title,
  });
}
