export {
  RecordSyncHandler,
  recordSyncHandlerFactory,
  RECORD_CHANGED,
  type RecordChange,
  type RecordSnapshot,
  type RecordSyncServices,
} from './record-sync-handler.js';
export {
  VersionedRecordStore,
  type VersionedRecord,
  type WriteOutcome,
  type DeleteOutcome,
} from './versioned-record-store.js';
