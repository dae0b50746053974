// Component snapshot as reported by a code structure provider

/**
 * A named unit of the analyzed system and the names it depends on
 */
export interface ComponentSnapshot {
  /** Unique component name */
  name: string;
  /** Names of the components this one depends on (duplicates are kept) */
  dependencies: string[];
}
