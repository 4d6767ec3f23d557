import type { Channel } from './types';

/**
 * Base class for every error raised by the linked-views core.
 */
export class LinkedViewsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A ChartSpec references a column the dataset does not have.
 * Raised at View construction; fatal to that view only.
 */
export class InvalidChannelMapping extends LinkedViewsError {
  constructor(
    public readonly channel: Channel | 'tooltip',
    public readonly column: string,
    datasetName: string,
  ) {
    super(
      `[View] Channel "${channel}" maps to unknown column "${column}" in dataset "${datasetName}".`,
    );
  }
}

/**
 * A predicate, key set or interaction cannot be applied.
 * The offending update is rejected and the prior selection state retained.
 */
export class InvalidPredicate extends LinkedViewsError {
  public readonly column?: string;
  public readonly sourceId?: string;

  constructor(
    message: string,
    details: { column?: string; sourceId?: string } = {},
  ) {
    super(message);
    this.column = details.column;
    this.sourceId = details.sourceId;
  }
}

/**
 * Dataset definition or row values are invalid.
 */
export class InvalidDataset extends LinkedViewsError {}
