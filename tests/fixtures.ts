import { RevisionKind, type DeletionRecord, type InsertionRecord } from '../src/types';

type RecordFields = Omit<InsertionRecord, 'kind'>;

const BASE: RecordFields = {
  text: '',
  author: 'Alice',
  date: '2024-03-01T09:00:00Z',
  id: '1',
  paragraphIndex: 0,
  originalContext: '',
  currentContext: '',
  originalOffset: 0,
};

export function insertionRecord(fields: Partial<RecordFields>): InsertionRecord {
  return { ...BASE, ...fields, kind: RevisionKind.Insertion };
}

export function deletionRecord(fields: Partial<RecordFields>): DeletionRecord {
  return { ...BASE, ...fields, kind: RevisionKind.Deletion };
}
