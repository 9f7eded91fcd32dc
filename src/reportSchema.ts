/** Version stamped on every JSON report and serialized error. */
export const HRX_REPORT_SCHEMA_VERSION = '1';
