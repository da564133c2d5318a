/** Version stamped on every serialized error and report. */
export const REPORT_SCHEMA_VERSION = '1';
