import { CatalogWalker, CATALOG_START } from '../catalog/CatalogWalker';
import { CatalogRecord, SelectionMode, SelectionOptions, WalkCursor } from '../types';
import { SelectionError } from '../utils/errors';

export type PlanDecision = 'skip' | 'take' | 'takeAndStop' | 'stop';

/**
 * Canonical iteration plan for one run: where the walk starts and what to do
 * with each record it yields. `slotIndex` is the 0-based descriptor slot
 * counted from the start cursor, malformed descriptors included; `taken`
 * counts records already selected.
 */
export interface IterationPlan {
  mode: SelectionMode;
  start: WalkCursor;
  requiresMatch: boolean;
  decide(record: CatalogRecord, slotIndex: number, taken: number): PlanDecision;
  describe(): string;
}

export interface SelectionBounds {
  /** Total number of records, when known ahead of time. */
  maxSequence?: number;
}

function assertInteger(value: number, label: string, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new SelectionError(`${label} must be an integer >= ${min}, got ${value}`);
  }
}

function assertWithinTotal(value: number, label: string, bounds: SelectionBounds): void {
  if (bounds.maxSequence !== undefined && value > bounds.maxSequence) {
    throw new SelectionError(
      `${label} ${value} is beyond the catalog size (${bounds.maxSequence} records)`
    );
  }
}

/** Parses "200-250" or "200" into an inclusive range. */
export function parseRange(text: string): { from: number; to: number } {
  const match = /^\s*(\d+)\s*(?:-\s*(\d+)\s*)?$/.exec(text);
  if (!match) {
    throw new SelectionError(`Invalid range format: ${text}. Use a form like '200-250' or '200'`);
  }
  const from = Number(match[1]);
  const to = match[2] !== undefined ? Number(match[2]) : from;
  return { from, to };
}

/**
 * Applies mode precedence: book id, then sequence number, then range, then
 * the legacy table/item/single/limit options.
 */
export function resolveSelection(options: SelectionOptions): SelectionMode {
  if (options.bookId !== undefined) {
    return { kind: 'byId', id: options.bookId };
  }
  if (options.sequence !== undefined) {
    return { kind: 'bySequence', sequence: options.sequence };
  }
  if (options.range !== undefined) {
    return { kind: 'range', ...parseRange(options.range) };
  }

  const table = options.table ?? 0;
  const item = options.item ?? 0;

  if (options.single !== undefined) {
    return { kind: 'single', ordinal: options.single, table, item };
  }
  if (options.limit !== undefined || options.table !== undefined || options.item !== undefined) {
    return { kind: 'legacy', table, item, limit: options.limit };
  }

  throw new SelectionError('No download mode specified. Use --help to see available options.');
}

export function describeSelection(mode: SelectionMode): string {
  switch (mode.kind) {
    case 'single':
      return `book #${mode.ordinal} counted from catalog ${mode.table}, item ${mode.item}`;
    case 'range':
      return `sequence numbers ${mode.from} to ${mode.to}`;
    case 'byId':
      return `book id ${mode.id}`;
    case 'bySequence':
      return `sequence number ${mode.sequence}`;
    case 'legacy':
      return `catalog ${mode.table}, item ${mode.item} onwards${
        mode.limit !== undefined ? `, up to ${mode.limit} books` : ''
      }`;
  }
}

/**
 * Validates a selection without touching the network and turns it into an
 * iteration plan.
 */
export function planSelection(mode: SelectionMode, bounds: SelectionBounds = {}): IterationPlan {
  const describe = () => describeSelection(mode);

  switch (mode.kind) {
    case 'bySequence': {
      assertInteger(mode.sequence, 'Sequence number', 1);
      assertWithinTotal(mode.sequence, 'Sequence number', bounds);
      const target = mode.sequence;
      return {
        mode,
        start: CATALOG_START,
        requiresMatch: true,
        describe,
        decide: record => {
          if (record.globalSequence < target) return 'skip';
          return record.globalSequence === target ? 'takeAndStop' : 'stop';
        },
      };
    }

    case 'range': {
      assertInteger(mode.from, 'Range start', 1);
      assertInteger(mode.to, 'Range end', 1);
      if (mode.from > mode.to) {
        throw new SelectionError(`Range start ${mode.from} is greater than range end ${mode.to}`);
      }
      assertWithinTotal(mode.to, 'Range end', bounds);
      const { from, to } = mode;
      return {
        mode,
        start: CATALOG_START,
        requiresMatch: true,
        describe,
        decide: record => {
          if (record.globalSequence < from) return 'skip';
          if (record.globalSequence < to) return 'take';
          return record.globalSequence === to ? 'takeAndStop' : 'stop';
        },
      };
    }

    case 'byId': {
      const id = mode.id.trim();
      if (id.length === 0) {
        throw new SelectionError('Book id must not be empty');
      }
      return {
        mode,
        start: CATALOG_START,
        requiresMatch: true,
        describe,
        decide: record => (record.id === id ? 'takeAndStop' : 'skip'),
      };
    }

    case 'single': {
      assertInteger(mode.table, 'Table', 0);
      assertInteger(mode.item, 'Item', 0);
      assertInteger(mode.ordinal, 'Single book number', 1);
      if (mode.ordinal <= mode.item) {
        throw new SelectionError(
          `Single book number ${mode.ordinal} comes before start item ${mode.item}`
        );
      }
      // The running counter starts at `item` and counts every descriptor slot
      const offset = mode.ordinal - mode.item - 1;
      return {
        mode,
        start: { catalogIndex: mode.table, position: mode.item },
        requiresMatch: true,
        describe,
        decide: (_record, slotIndex) => {
          if (slotIndex < offset) return 'skip';
          return slotIndex === offset ? 'takeAndStop' : 'stop';
        },
      };
    }

    case 'legacy': {
      assertInteger(mode.table, 'Table', 0);
      assertInteger(mode.item, 'Item', 0);
      const { limit } = mode;
      if (limit !== undefined) {
        assertInteger(limit, 'Limit', 1);
      }
      return {
        mode,
        start: { catalogIndex: mode.table, position: mode.item },
        requiresMatch: false,
        describe,
        decide: (_record, _slotIndex, taken) =>
          limit !== undefined && taken + 1 >= limit ? 'takeAndStop' : 'take',
      };
    }
  }
}

/**
 * Yields the records an iteration plan selects, stopping the walk as soon as
 * the plan has nothing more to take.
 */
export async function* selectRecords(
  walker: CatalogWalker,
  plan: IterationPlan
): AsyncGenerator<CatalogRecord, void, undefined> {
  let taken = 0;

  for await (const { record, slotIndex } of walker.walkSlots(plan.start)) {
    const decision = plan.decide(record, slotIndex, taken);

    if (decision === 'stop') break;
    if (decision === 'skip') continue;

    taken++;
    yield record;

    if (decision === 'takeAndStop') break;
  }

  if (plan.requiresMatch && taken === 0) {
    throw new SelectionError(`No catalog record matches ${plan.describe()}`);
  }
}
