/**
 * Row shapes as they come back from SQLite.
 *
 * Mapping to the domain types in `core/job-types.ts` happens in the
 * store modules.
 */

export interface SubscriberRow {
  subscriber_id: string;
  preferred_city: string;
  /** Comma-separated job types (GROUP_CONCAT), null when none enabled */
  jobs: string | null;
}

export interface MetadataRow {
  value: string;
}
