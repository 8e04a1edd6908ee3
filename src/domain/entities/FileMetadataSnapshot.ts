/**
 * FileMetadataSnapshot - result of one enumeration of a device directory
 */
export interface FileMetadataSnapshot {
  deviceId: string;
  directory: string;
  /** Modification times in epoch milliseconds (UTC), ascending, already filtered */
  timestamps: number[];
  /** Taken just before the directory listing started */
  captureTime: Date;
  /** Entries that vanished or became unreadable between listing and stat */
  skippedEntries: number;
  durationMs: number;
}
