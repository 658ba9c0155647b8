/** Schema version stamped on every serialized error and warning. */
export const POLYTEXT_REPORT_SCHEMA_VERSION = '1';
