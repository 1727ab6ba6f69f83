import { CatalogRecord } from '../types';
import { MalformedRecordError } from '../utils/errors';
import { isObject, nonEmptyString } from '../utils/guards';

export interface RecordCoordinates {
  catalogIndex: number;
  position: number;
  globalSequence: number;
}

// Publisher tags carry the edition marker, e.g. "人教版"
const PUBLISHER_MARKER = '版';

function findPublisher(tags: unknown[]): string {
  for (const tag of tags) {
    if (isObject(tag) && typeof tag.tag_name === 'string' && tag.tag_name.includes(PUBLISHER_MARKER)) {
      return tag.tag_name.trim();
    }
  }
  return '';
}

export function normalizeRecord(raw: unknown, coordinates: RecordCoordinates): CatalogRecord {
  const where = `catalog ${coordinates.catalogIndex}, position ${coordinates.position}`;

  if (!isObject(raw)) {
    throw new MalformedRecordError(`Descriptor at ${where} is not an object`);
  }

  const id = nonEmptyString(raw.id);
  if (!id) {
    throw new MalformedRecordError(`Descriptor at ${where} has no id`);
  }

  const title = nonEmptyString(raw.title);
  if (!title) {
    throw new MalformedRecordError(`Descriptor ${id} at ${where} has no title`);
  }

  if (!Array.isArray(raw.tag_list)) {
    throw new MalformedRecordError(`Descriptor ${id} at ${where} has no tag list`);
  }

  return Object.freeze({
    id,
    title,
    publisher: findPublisher(raw.tag_list),
    catalogIndex: coordinates.catalogIndex,
    position: coordinates.position,
    globalSequence: coordinates.globalSequence,
  });
}
